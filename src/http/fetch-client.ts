export interface FetchClient {
  fetch(input: string | URL, init?: RequestInit): Promise<Response>;
}
