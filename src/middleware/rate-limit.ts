import rateLimit from "express-rate-limit";

export const createApiRateLimiter = (limitPerMinute: number) =>
  rateLimit({
    windowMs: 60 * 1000,
    limit: limitPerMinute,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "Too many requests - please try again later." },
  });
