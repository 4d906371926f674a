import {
  AxiosError,
  AxiosHeaders,
  AxiosResponse,
  RawAxiosResponseHeaders,
} from 'axios';

export function axiosResponse<T>(
  data: T,
  status: number = 200,
  headers: RawAxiosResponseHeaders = {},
): AxiosResponse<T> {
  return {
    data,
    status,
    statusText: String(status),
    headers,
    config: { headers: new AxiosHeaders() },
  };
}

export function axiosError(
  status: number,
  data: unknown,
  headers: RawAxiosResponseHeaders = {},
): AxiosError {
  return new AxiosError(
    `Request failed with status code ${status}`,
    status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
    undefined,
    undefined,
    axiosResponse(data, status, headers),
  );
}
