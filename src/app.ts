import express from "express";
import cors from "cors";
import { analyze, PhoneNumberAnalysis } from "./batch";
import { config } from "./config";
import { formatNumber, PhoneFormat } from "./formatter";
import logger from "./logger";
import { ParseFailure } from "./normalizer";
import { COUNTRIES, findCountryByIso } from "./registry";
import { extractAll, extractWithCountryHint, redact } from "./textScanner";

interface ValidationResponse {
  number: string;
  valid: boolean;
  normalized: string | null;
  country: { code: string; name: string; prefix: number } | null;
  type: string | null;
  formatted: { international: string; national: string; rfc3966: string } | null;
  message: string;
}

function toResponse(analysis: PhoneNumberAnalysis): ValidationResponse {
  const { original, normalized, country } = analysis;
  return {
    number: original,
    valid: analysis.isValid,
    normalized,
    country: country ? { code: country.code, name: country.name, prefix: country.prefix } : null,
    type: analysis.type,
    formatted: normalized
      ? {
          international: formatNumber(normalized, PhoneFormat.International) ?? normalized,
          national: formatNumber(normalized, PhoneFormat.National) ?? normalized,
          rfc3966: formatNumber(normalized, PhoneFormat.RFC3966) ?? normalized,
        }
      : null,
    message: getResultMessage(analysis),
  };
}

function getResultMessage(analysis: PhoneNumberAnalysis): string {
  if (analysis.isValid) {
    return analysis.country ? `Valid number (${analysis.country.name})` : "Valid number";
  }
  switch (analysis.failure) {
    case ParseFailure.EMPTY:
      return "No digits found";
    case ParseFailure.INVALID_CHARACTER:
      return "Number contains invalid characters";
    case ParseFailure.UNKNOWN_COUNTRY:
      return "No country matches this number";
    case ParseFailure.INVALID_LENGTH:
      return "Number has the wrong length for its country";
    default:
      return "Invalid number";
  }
}

function badRequest(res: express.Response, message: string) {
  return res.status(400).json({ error: "Invalid request", message });
}

export function createApp(): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      countriesLoaded: COUNTRIES.length,
      timestamp: new Date().toISOString(),
    });
  });

  app.get("/info", (_req, res) => {
    res.json({
      service: "dialplan",
      description: "Phone number validation, normalization and extraction",
      endpoints: {
        "GET /validate?number=<number>": "Validate a single number",
        "POST /validate/batch": `Validate multiple numbers (max ${config.batchLimit})`,
        "POST /extract": "Find phone numbers in text, optionally with a default country",
        "POST /redact": "Mask phone numbers in text",
        "GET /health": "Service health check",
        "GET /info": "Service information",
      },
      countriesLoaded: COUNTRIES.length,
    });
  });

  app.get("/validate", (req, res) => {
    const { number } = req.query;
    if (!number || typeof number !== "string") {
      return badRequest(res, "Please provide a number in the query string (e.g., ?number=+12025550173)");
    }
    res.json(toResponse(analyze(number)));
  });

  app.post("/validate/batch", (req, res) => {
    const numbers: unknown = req.body?.numbers;
    if (!Array.isArray(numbers) || !numbers.every((n): n is string => typeof n === "string")) {
      return badRequest(res, "Please provide an array of numbers in the request body");
    }
    if (numbers.length > config.batchLimit) {
      return res.status(400).json({
        error: "Request too large",
        message: `Maximum ${config.batchLimit} numbers per batch request`,
      });
    }
    const results = numbers.map((n) => toResponse(analyze(n)));
    res.json({ results, count: results.length });
  });

  app.post("/extract", (req, res) => {
    const text: unknown = req.body?.text;
    const country: unknown = req.body?.country;
    if (typeof text !== "string") return badRequest(res, "Please provide text in the request body");
    if (country !== undefined && (typeof country !== "string" || !findCountryByIso(country))) {
      return badRequest(res, "Unknown country code");
    }
    const numbers = typeof country === "string" ? extractWithCountryHint(text, country) : extractAll(text);
    res.json({ numbers, count: numbers.length });
  });

  app.post("/redact", (req, res) => {
    const text: unknown = req.body?.text;
    const visibleDigits: unknown = req.body?.visibleDigits ?? 0;
    if (typeof text !== "string") return badRequest(res, "Please provide text in the request body");
    if (typeof visibleDigits !== "number" || !Number.isInteger(visibleDigits) || visibleDigits < 0) {
      return badRequest(res, "visibleDigits must be a non-negative integer");
    }
    res.json({ text: redact(text, { visibleDigits }) });
  });

  app.use((err: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error({ error: err, url: req.url, method: req.method }, "Unhandled error");
    res.status(500).json({
      error: "Internal server error",
      message: "An unexpected error occurred",
    });
  });

  app.use((_req, res) => {
    res.status(404).json({
      error: "Not found",
      message: "Endpoint not found. Try GET /info for available endpoints.",
    });
  });

  return app;
}
