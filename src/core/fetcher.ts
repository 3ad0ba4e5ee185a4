import { AxiosInstance } from "axios";

/** Anything that can turn a URL into page markup. Rejects on transport failure. */
export interface PageFetcher {
  fetchText(url: string): Promise<string>;
}

/**
 * Fetch pages as raw text through a configured axios instance.
 * @param http - Client built by createHttpClient
 */
export function createPageFetcher(http: AxiosInstance): PageFetcher {
  return {
    async fetchText(url: string): Promise<string> {
      const response = await http.get<string>(url, { responseType: "text" });
      return response.data;
    },
  };
}
