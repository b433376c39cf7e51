import axios, { AxiosError, type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';

export type RecordedRequest = {
  method: string | undefined;
  url: string | undefined;
  params: unknown;
  data: unknown;
  headers: Record<string, unknown>;
};

export type StubResponse = {
  status: number;
  data?: unknown;
};

/** Axios instance whose adapter answers from a queue instead of the network. */
export function createStubHttp(baseURL = 'http://rest.test/v1') {
  const requests: RecordedRequest[] = [];
  const responses: StubResponse[] = [];

  const http: AxiosInstance = axios.create({
    baseURL,
    adapter: async (config: InternalAxiosRequestConfig) => {
      requests.push({
        method: config.method,
        url: config.url,
        params: config.params,
        data: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
        headers: config.headers.toJSON()
      });
      const next = responses.shift() ?? { status: 200, data: [] };
      const response: AxiosResponse = {
        status: next.status,
        statusText: String(next.status),
        headers: {},
        config,
        data: next.data ?? null
      };
      if (next.status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${next.status}`,
          next.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
          config,
          null,
          response
        );
      }
      return response;
    }
  });

  return {
    http,
    requests,
    respond(...queued: StubResponse[]) {
      responses.push(...queued);
    }
  };
}
