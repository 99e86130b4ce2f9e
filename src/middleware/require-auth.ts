import type { RequestHandler } from "express";
import { UnauthorizedError } from "../utils/errors.js";
import { extractBearerToken, tokensMatch } from "../utils/token.js";

/** Bearer API key check; a missing key in the config leaves the API open. */
export const requireApiKey =
  (apiKey?: string): RequestHandler =>
  (req, _res, next) => {
    if (!apiKey) return next();
    const token = extractBearerToken(req.header("authorization"));
    if (!token || !tokensMatch(token, apiKey)) {
      return next(new UnauthorizedError("Missing or invalid API key"));
    }
    return next();
  };
