import rateLimit from "express-rate-limit";
import { errorBody } from "../types";

function createLimiter(windowMs: number, max: number) {
  return rateLimit({
    windowMs,
    max,
    standardHeaders: true,
    legacyHeaders: false,
    message: () => errorBody("RATE_LIMITED", `Too many requests. Limit: ${max} per ${windowMs / 60000} minute(s).`),
  });
}

/** 100 req/min, all v1 routes */
export const createGeneralLimiter = () => createLimiter(60_000, 100);

/** 20 req/min on /plan, which re-analyzes the whole record store */
export const createPlanLimiter = () => createLimiter(60_000, 20);
