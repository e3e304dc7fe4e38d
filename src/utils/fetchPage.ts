import axios from "axios";

import { buildFetchRequestConfig } from "../constants/fetchRequestConfig";
import { EXTRACTOR_CONFIG } from "../config/extractorConfig";
import {
  HTTPStatusError,
  InvalidUrlError,
  NetworkError,
} from "../errors/extractor/ExtractorErrorTypes";
import { FetchedPage } from "../types/documentTypes";
import { charsetOf, decodeBody } from "./decodeBody";
import { UrlValidator } from "./UrlValidator";

export interface FetchOptions {
  timeoutSeconds?: number;
  userAgent?: string;
}

/** Single GET, no retries. */
export async function fetchPage(url: string, options: FetchOptions = {}): Promise<FetchedPage> {
  if (!UrlValidator.isFetchableUrl(url)) {
    throw new InvalidUrlError(url);
  }

  const config = buildFetchRequestConfig(
    options.timeoutSeconds ?? EXTRACTOR_CONFIG.timeoutSeconds,
    options.userAgent ?? EXTRACTOR_CONFIG.userAgent
  );

  try {
    const response = await axios.get<ArrayBuffer>(url, config);

    return {
      url,
      html: decodeBody(response.data, charsetOf(response.headers["content-type"])),
    };
  } catch (error) {
    if (axios.isAxiosError(error)) {
      if (error.response) {
        throw new HTTPStatusError(url, error.response.status, error.response.statusText);
      }
      throw new NetworkError(url, error.message, error.code ?? null);
    }
    throw error;
  }
}
