import axios, { type AxiosInstance } from 'axios';

export interface BrokerClientConfig {
  host: string;
  port: number;
  basePath?: string;
  timeoutMs?: number;
}

export function brokerBaseUrl(config: BrokerClientConfig): string {
  const basePath = config.basePath ?? '/ngsi-ld/v1';
  return `http://${config.host}:${config.port}${basePath}`;
}

export function createBrokerClient(config: BrokerClientConfig): AxiosInstance {
  return axios.create({
    baseURL: brokerBaseUrl(config),
    timeout: config.timeoutMs ?? 10000,
    headers: {
      Accept: 'application/ld+json',
    },
  });
}
