import type { Response } from "express";

export interface ApiMeta {
  apiVersion: "v1";
  timestamp: string;
  total?: number;
}

export interface ApiResponse<T> {
  data: T;
  meta: ApiMeta;
}

export interface ApiErrorBody {
  error: { code: string; message: string };
  meta: { apiVersion: "v1"; timestamp: string };
}

export function envelope<T>(data: T, total?: number): ApiResponse<T> {
  const meta: ApiMeta = {
    apiVersion: "v1",
    timestamp: new Date().toISOString(),
  };
  if (total !== undefined) meta.total = total;
  return { data, meta };
}

export function errorBody(code: string, message: string): ApiErrorBody {
  return {
    error: { code, message },
    meta: { apiVersion: "v1", timestamp: new Date().toISOString() },
  };
}

export function sendError(res: Response, status: number, code: string, message: string): void {
  res.status(status).json(errorBody(code, message));
}
