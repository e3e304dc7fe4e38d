// routes/extractRoutes.ts
import { Router } from "express";
import { EXTRACTOR_CONFIG } from "../config/extractorConfig";
import { HTTPStatusError, NetworkError } from "../errors/extractor/ExtractorErrorTypes";
import { countTokens } from "../utils/countTokens";
import { extractPage } from "../utils/extractVisibleText";
import { UrlValidator } from "../utils/UrlValidator";

const router = Router();

interface ExtractRequestBody {
  url?: unknown;
  timeout?: unknown;
}

const parseTimeout = (value: unknown): number | null => {
  if (value === undefined) return EXTRACTOR_CONFIG.timeoutSeconds;
  return typeof value === "number" && Number.isFinite(value) && value > 0 ? value : null;
};

// POST /api/extract - Fetch a page and return its annotated visible text
router.post("/", async (req, res) => {
  const { url, timeout }: ExtractRequestBody = req.body ?? {};

  if (typeof url !== "string" || !UrlValidator.isFetchableUrl(url)) {
    res.status(400).json({ error: "Invalid URL" });
    return;
  }

  const timeoutSeconds = parseTimeout(timeout);
  if (timeoutSeconds === null) {
    res.status(400).json({ error: "Invalid timeout" });
    return;
  }

  try {
    const page = await extractPage(url, { timeoutSeconds });

    res.json({
      url,
      text: page.text,
      tokenCount: countTokens(page.text),
    });
  } catch (error) {
    console.error(`Extraction failed for ${url}:`, error);

    if (error instanceof HTTPStatusError) {
      res.status(502).json({ error: error.message, upstreamStatus: error.status });
      return;
    }

    if (error instanceof NetworkError) {
      res.status(error.isTimeout ? 504 : 502).json({ error: error.message });
      return;
    }

    res.status(500).json({
      error: "Failed to extract page",
      details: error instanceof Error ? error.message : "Unknown error",
    });
  }
});

export const extractRouter = router;
