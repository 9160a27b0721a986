import https from 'https';
import axios, { type AxiosInstance, type AxiosProxyConfig } from 'axios';
import { ConfigurationError } from '../types/errors.js';

export type HttpMethod = 'GET' | 'POST';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  params?: Record<string, string>;
  headers?: Record<string, string>;
  json?: unknown;
}

export interface HttpResponse {
  status: number;
  body: string;
}

/** Anything that can send a request and hand back the status and raw body. */
export interface HttpTransport {
  request(req: HttpRequest): Promise<HttpResponse>;
}

/**
 * Identity the client presents to the backend. Only the header side of the
 * profile is applied; TLS fingerprinting is left to the network layer.
 */
export interface ClientProfile {
  name: string;
  headers: Record<string, string>;
}

export const ANDROID_PROFILE: ClientProfile = {
  name: 'okhttp4_android',
  headers: {
    'User-Agent': 'Skyscanner/7.124 (Android 13; okhttp/4.12.0)',
    'Accept': 'application/json'
  }
};

export interface TransportOptions {
  headers: Record<string, string>;
  profile?: ClientProfile;
  proxy?: string;
  verify?: boolean;
}

const REQUEST_TIMEOUT_MS = 30000;

export function parseProxy(proxy: string): AxiosProxyConfig | false {
  if (!proxy) return false;

  let url: URL;
  try {
    url = new URL(proxy);
  } catch (error) {
    throw new ConfigurationError(`Invalid proxy URL: ${proxy}`);
  }

  const protocol = url.protocol.replace(/:$/, '');
  const port = url.port ? Number(url.port) : protocol === 'https' ? 443 : 80;
  const config: AxiosProxyConfig = { protocol, host: url.hostname, port };
  if (url.username) {
    config.auth = {
      username: decodeURIComponent(url.username),
      password: decodeURIComponent(url.password)
    };
  }
  return config;
}

export class AxiosTransport implements HttpTransport {
  private readonly http: AxiosInstance;
  readonly profile: ClientProfile;

  constructor(options: TransportOptions) {
    this.profile = options.profile ?? ANDROID_PROFILE;
    this.http = axios.create({
      headers: { ...this.profile.headers, ...options.headers },
      proxy: parseProxy(options.proxy ?? ''),
      httpsAgent: new https.Agent({ rejectUnauthorized: options.verify ?? true }),
      timeout: REQUEST_TIMEOUT_MS,
      responseType: 'text',
      transformResponse: [data => data],
      // status handling belongs to the response classifier
      validateStatus: () => true
    });
  }

  async request(req: HttpRequest): Promise<HttpResponse> {
    const response = await this.http.request<string>({
      method: req.method,
      url: req.url,
      params: req.params,
      headers: req.headers,
      data: req.json
    });
    const body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data ?? '');
    return { status: response.status, body };
  }
}
