export {
  type HttpMethod,
  type QueryParams,
  type UploadFile,
  type HttpRequest,
  type HttpResponse,
  type HttpClient,
  type FetchHttpClientOptions,
  BaseHttpClient,
  FetchHttpClient,
  isSuccess,
  buildUrl,
} from './http-client.js';
