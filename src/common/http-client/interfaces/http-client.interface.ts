import { AxiosRequestConfig, AxiosResponse } from 'axios';

export interface HttpClient {
  get<T>(url: string, config?: AxiosRequestConfig): Promise<AxiosResponse<T>>;
}
