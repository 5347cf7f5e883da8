import * as fs from 'fs';
import * as path from 'path';
import { fetchAll } from '../fetch';
import { CancelledError, DownloadError, ExtractionError, PrerequisiteError } from '../errors';
import { FetchOptions, RuntimeEntry } from '../models';
import { SilentProgressBarFactory } from '../ui';
import {
    createMockHttpClient,
    createMockProcessExecutor,
    createMockZipExtractor,
    makeTempDirectory,
    MockHttpClient,
    MockProcessExecutor,
    streamResponse,
} from './helpers/mocks';
import { FakeToolOptions, fakeToolHandler, fakeWixExtraction } from './helpers/fake-tools';

const VC2008: RuntimeEntry = { version: '9.0.30729.4148', url: 'https://example.com/9/vcredist_x64.exe' };
const VC2010: RuntimeEntry = { version: '10.0.40219.32503', url: 'https://example.com/10/vcredist_x64.exe' };
const VC2013: RuntimeEntry = { version: '12.0.30501.0', url: 'https://example.com/12/vcredist_x64.exe' };
const VC2022: RuntimeEntry = { version: '14.42.34438.0', url: 'https://example.com/pr/VC_redist.x64.exe' };

describe('fetchAll', () => {
    let destination: string;
    let downloads: string;
    let httpClient: MockHttpClient;
    let processExecutor: MockProcessExecutor;
    let log: jest.SpyInstance;
    let errorLog: jest.SpyInstance;

    function options(overrides: Partial<FetchOptions> = {}): FetchOptions {
        return {
            destination,
            catalog: [VC2022],
            httpClient,
            processExecutor,
            zipExtractor: createMockZipExtractor(fakeWixExtraction),
            progressBarFactory: new SilentProgressBarFactory(),
            ...overrides,
        };
    }

    function useTools(toolOptions: FakeToolOptions): void {
        processExecutor = createMockProcessExecutor(fakeToolHandler(toolOptions));
    }

    function spawnedTools(): string[] {
        return processExecutor.spawn.mock.calls.map(([command]) => path.basename(command));
    }

    function requestedUrls(): Array<string | undefined> {
        return httpClient.request.mock.calls.map(([config]) => config.url);
    }

    beforeEach(() => {
        destination = makeTempDirectory();
        downloads = path.join(destination, 'Downloads');
        fs.mkdirSync(downloads);
        httpClient = createMockHttpClient();
        processExecutor = createMockProcessExecutor(fakeToolHandler());
        log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        errorLog = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        log.mockRestore();
        errorLog.mockRestore();
        fs.rmSync(destination, { recursive: true, force: true });
    });

    it('should refuse to run without a Downloads directory', async () => {
        fs.rmdirSync(downloads);

        const promise = fetchAll(options());

        await expect(promise).rejects.toThrow(PrerequisiteError);
        await expect(promise).rejects.toThrow(`The download directory does not exist: ${downloads}`);
        expect(httpClient.request).not.toHaveBeenCalled();
        expect(fs.readdirSync(destination)).toEqual([]);
    });

    it('should download and extract a bundle, then skip it on the next run', async () => {
        const first = await fetchAll(options());

        const output = path.join(destination, 'vcruntime_14.42.34438.0');
        expect(first).toEqual([{ version: '14.42.34438.0', status: 'extracted', outputDirectory: output }]);
        expect(fs.readdirSync(output).sort()).toEqual(['vcRuntimeAdditional_amd64.dll', 'vcRuntimeMinimum_amd64.dll']);
        expect(fs.existsSync(path.join(downloads, '14.42.34438.0_VC_redist.x64.exe'))).toBe(true);
        expect(spawnedTools()).toEqual(['dark.exe', 'expand.exe', 'expand.exe']);

        httpClient.request.mockClear();
        processExecutor.spawn.mockClear();
        log.mockClear();

        const second = await fetchAll(options());

        expect(second).toEqual([{ version: '14.42.34438.0', status: 'already-extracted', outputDirectory: output }]);
        expect(httpClient.request).not.toHaveBeenCalled();
        expect(processExecutor.spawn).not.toHaveBeenCalled();
        expect(log).toHaveBeenCalledWith('Already have 14.42.34438.0');
    });

    it('should leave versions before 14 alone unless asked', async () => {
        const results = await fetchAll(options({ catalog: [VC2008, VC2010, VC2013, VC2022] }));

        expect(results.map(r => r.status)).toEqual(['filtered', 'filtered', 'filtered', 'extracted']);
        expect(requestedUrls()).toEqual([
            'https://github.com/wixtoolset/wix3/releases/download/wix3111rtm/wix311-binaries.zip',
            VC2022.url,
        ]);
        expect(fs.readdirSync(destination).sort()).toEqual(['Downloads', 'vcruntime_14.42.34438.0']);
    });

    it('should dispatch each version to its extraction strategy', async () => {
        const results = await fetchAll(options({
            catalog: [VC2008, VC2010, VC2013, VC2022],
            includeOldVersions: true,
        }));

        expect(results.map(r => [r.version, r.status])).toEqual([
            ['9.0.30729.4148', 'extracted'],
            ['10.0.40219.32503', 'unsupported'],
            ['12.0.30501.0', 'extracted'],
            ['14.42.34438.0', 'extracted'],
        ]);
        expect(spawnedTools()).toEqual([
            '__7zr.exe', '7za.exe', 'expand.exe',
            'dark.exe', 'expand.exe', 'expand.exe',
            'dark.exe', 'expand.exe', 'expand.exe',
        ]);
        expect(log).toHaveBeenCalledWith('Cannot extract Visual C++ 2010 runtime. Skipping.');
        expect(fs.existsSync(path.join(destination, 'vcruntime_10.0.40219.32503'))).toBe(false);
        expect(fs.readdirSync(path.join(destination, 'vcruntime_9.0.30729.4148'))).toHaveLength(1);
    });

    it('should report a legacy installer without cabinets and carry on', async () => {
        useTools({ legacyCabs: [] });
        const installer = path.join(downloads, '9.0.30729.4148_vcredist_x64.exe');

        const results = await fetchAll(options({ catalog: [VC2008, VC2022], includeOldVersions: true }));

        expect(results[0].status).toBe('failed');
        expect(results[0].error).toBeInstanceOf(ExtractionError);
        expect(results[0].error?.message).toBe(`Failed to extract any cabinet file from ${installer}.`);
        expect(results[1].status).toBe('extracted');
        expect(fs.existsSync(path.join(destination, 'vcruntime_9.0.30729.4148'))).toBe(false);
        expect(errorLog).toHaveBeenCalledWith(
            `Failed to extract 9.0.30729.4148: Failed to extract any cabinet file from ${installer}.`,
        );
    });

    it('should remove the output directory when expansion fails', async () => {
        useTools({ exitCodes: { 'expand.exe': 1 } });

        const results = await fetchAll(options());

        expect(results).toHaveLength(1);
        expect(results[0].status).toBe('failed');
        expect(results[0].error?.message).toBe('expand.exe failed: Process exited with code 1');
        expect(fs.existsSync(path.join(destination, 'vcruntime_14.42.34438.0'))).toBe(false);
    });

    it('should report a bundle without x64 packages', async () => {
        useTools({ bundlePackages: ['vcRuntimeMinimum_x86'] });

        const results = await fetchAll(options());

        expect(results[0].status).toBe('failed');
        expect(results[0].error?.message).toMatch(/^No _amd64 package found in /);
        expect(spawnedTools()).toEqual(['dark.exe']);
    });

    it('should extract into an output directory that exists but is empty', async () => {
        const output = path.join(destination, 'vcruntime_14.42.34438.0');
        fs.mkdirSync(output);

        const results = await fetchAll(options());

        expect(results[0].status).toBe('extracted');
        expect(fs.readdirSync(output)).toHaveLength(2);
    });

    it('should fetch 7-Zip once for several legacy installers', async () => {
        const other: RuntimeEntry = { version: '9.0.21022.8', url: 'https://example.com/9b/vcredist_x64.exe' };

        await fetchAll(options({ catalog: [VC2008, other], includeOldVersions: true }));

        expect(spawnedTools()).toEqual(['__7zr.exe', '7za.exe', 'expand.exe', '7za.exe', 'expand.exe']);
    });

    it('should abort the run when an installer cannot be downloaded', async () => {
        httpClient.request.mockImplementation(async (config) => {
            if (config.url === VC2022.url) {
                throw new Error('Request failed with status code 503');
            }
            return streamResponse([Buffer.from('zip')]);
        });

        const promise = fetchAll(options({ catalog: [VC2022, VC2013], includeOldVersions: true }));

        await expect(promise).rejects.toThrow(DownloadError);
        await expect(promise).rejects.toThrow(`Download failed: ${VC2022.url}`);
        expect(requestedUrls()).not.toContain(VC2013.url);
        expect(processExecutor.spawn).not.toHaveBeenCalled();
        expect(fs.readdirSync(downloads).sort()).toEqual(['__wix', '__wix.zip']);
    });

    it('should not start when already cancelled', async () => {
        const controller = new AbortController();
        controller.abort();

        await expect(fetchAll(options({ signal: controller.signal }))).rejects.toThrow(CancelledError);
        expect(httpClient.request).not.toHaveBeenCalled();
    });

    it('should stop between runtimes when cancelled', async () => {
        const controller = new AbortController();
        httpClient.request.mockImplementation(async (config) => {
            if (config.url === VC2013.url) {
                controller.abort();
            }
            return streamResponse([Buffer.from('bytes')]);
        });

        await expect(fetchAll(options({
            catalog: [VC2013, VC2022],
            includeOldVersions: true,
            signal: controller.signal,
        }))).rejects.toThrow(CancelledError);

        expect(fs.readdirSync(path.join(destination, 'vcruntime_12.0.30501.0'))).toHaveLength(2);
        expect(requestedUrls()).not.toContain(VC2022.url);
    });
});

describe('fetchAll with the bundled catalog', () => {
    it('should only consider version 14 and later by default', async () => {
        const destination = makeTempDirectory();
        fs.mkdirSync(path.join(destination, 'Downloads'));
        const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        const httpClient = createMockHttpClient();

        try {
            const results = await fetchAll({
                destination,
                httpClient,
                processExecutor: createMockProcessExecutor(fakeToolHandler()),
                zipExtractor: createMockZipExtractor(fakeWixExtraction),
                progressBarFactory: new SilentProgressBarFactory(),
            });

            const processed = results.filter(r => r.status !== 'filtered').map(r => r.version);
            expect(processed.length).toBeGreaterThan(0);
            expect(processed.every(v => parseInt(v, 10) >= 14)).toBe(true);
            expect(results.filter(r => r.status === 'filtered').map(r => r.version)).toEqual([
                '9.0.30729.4148', '10.0.40219.32503', '11.0.61030.0', '12.0.30501.0',
            ]);
        } finally {
            log.mockRestore();
            fs.rmSync(destination, { recursive: true, force: true });
        }
    });
});
