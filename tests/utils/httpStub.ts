import axios, {
  AxiosAdapter,
  AxiosError,
  AxiosInstance,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from 'axios';

export type StubOutcome = { status: number; data: unknown } | Error;

export type StubHandler = (config: InternalAxiosRequestConfig) => StubOutcome;

/**
 * Real axios instance whose transport is replaced by an in-process handler.
 * Non-2xx outcomes reject with an AxiosError, as the http adapter would.
 */
export function createStubClient(handler: StubHandler): {
  client: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
} {
  const requests: InternalAxiosRequestConfig[] = [];

  const adapter: AxiosAdapter = async config => {
    requests.push(config);

    const outcome = handler(config);
    if (outcome instanceof Error) throw outcome;

    const response: AxiosResponse = {
      data: outcome.data,
      status: outcome.status,
      statusText: String(outcome.status),
      headers: {},
      config,
    };

    if (outcome.status >= 200 && outcome.status < 300) return response;

    throw new AxiosError(
      `Request failed with status code ${outcome.status}`,
      AxiosError.ERR_BAD_RESPONSE,
      config,
      null,
      response
    );
  };

  return { client: axios.create({ adapter }), requests };
}

export function param(config: InternalAxiosRequestConfig, name: string): string | undefined {
  const params: unknown = config.params;

  if (typeof params !== 'object' || params === null || !(name in params)) return undefined;

  return String(Reflect.get(params, name));
}
