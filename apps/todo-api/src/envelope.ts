import type { Response } from "express";
import type { ApiResponse, ResponseMessage } from "@todo-service/types";

export const MESSAGE_SUCCESS: ResponseMessage = "Success";
export const MESSAGE_FAILED: ResponseMessage = "Failed";

export function buildEnvelope<T>(data: T | null, status: number, message: ResponseMessage): ApiResponse<T> {
  return { data, status, message };
}

export function sendEnvelope<T>(res: Response, data: T | null, status: number, message: ResponseMessage): void {
  res.status(status).json(buildEnvelope(data, status, message));
}

export function success<T>(res: Response, data: T, status = 200): void {
  sendEnvelope(res, data, status, MESSAGE_SUCCESS);
}

export function failure<T = never>(res: Response, status: number, data: T | null = null): void {
  sendEnvelope(res, data, status, MESSAGE_FAILED);
}
