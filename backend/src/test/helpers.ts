/**
 * Test helpers: Express req/res doubles for driving route handlers without a
 * socket, and a task factory.
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { Task } from "../types.js";

export interface MockReqOptions {
  body?: unknown;
  query?: Record<string, string>;
  params?: Record<string, string>;
  file?: { buffer: Buffer; originalname: string };
}

export interface MockedResponse {
  statusCode: number;
  body: unknown;
}

export function mockReq(opts: MockReqOptions = {}): Request {
  return { body: opts.body, query: opts.query ?? {}, params: opts.params ?? {}, file: opts.file } as unknown as Request;
}

export function mockRes(): Response & MockedResponse {
  const res = {
    statusCode: 200,
    body: undefined as unknown,
    status(code: number) {
      res.statusCode = code;
      return res;
    },
    json(payload: unknown) {
      res.body = payload;
      return res;
    },
  };
  return res as unknown as Response & MockedResponse;
}

export const noopNext: NextFunction = () => {};

/** Task with no dependencies and a one-day duration. */
export function task(id: string, start: string, end: string, name = `Task ${id}`): Task {
  return { id, name, start, end, duration: 1, predecessors: [], successors: [] };
}

/** Runs a route's handlers in order, as Express would when each calls next(). */
export async function runHandlers(handlers: RequestHandler[], req: Request, res: Response): Promise<void> {
  for (const handler of handlers) await handler(req, res, noopNext);
}
