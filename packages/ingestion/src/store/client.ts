import axios, { type AxiosInstance } from 'axios';

export interface StoreClientConfig {
  restUrl: string;
  timeoutMs?: number;
}

export function createStoreClient(config: StoreClientConfig): AxiosInstance {
  return axios.create({
    baseURL: config.restUrl,
    timeout: config.timeoutMs ?? 30000,
    headers: {
      Accept: 'application/json',
      'Content-Type': 'application/json',
    },
  });
}
