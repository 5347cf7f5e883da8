import axios, { AxiosRequestConfig, AxiosResponse } from 'axios';
import { Readable } from 'stream';

/**
 * HTTP client abstraction interface for testability. Every download is
 * streamed, so responses carry a readable body.
 */
export interface IHttpClient {
    request(config: AxiosRequestConfig): Promise<AxiosResponse<Readable>>;
}

/**
 * Default implementation using axios
 */
export class AxiosHttpClient implements IHttpClient {
    async request(config: AxiosRequestConfig): Promise<AxiosResponse<Readable>> {
        return axios.request<Readable>({ ...config, responseType: 'stream' });
    }
}
