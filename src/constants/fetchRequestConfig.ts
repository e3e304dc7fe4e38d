import { AxiosRequestConfig } from "axios";

export const buildFetchRequestConfig = (
  timeoutSeconds: number,
  userAgent: string
): AxiosRequestConfig => ({
  headers: {
    "User-Agent": userAgent,
    Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    "Accept-Language": "en-US,en;q=0.5",
  },
  timeout: Math.round(timeoutSeconds * 1000),
  maxContentLength: 10 * 1024 * 1024, // 10MB limit
  responseType: "arraybuffer",
  // 2xx only; everything else surfaces as HTTPStatusError
  validateStatus: (status) => status >= 200 && status < 300,
});
