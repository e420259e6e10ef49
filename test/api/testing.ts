import type { VercelRequest, VercelResponse } from '@vercel/node';

// In-process stand-ins for the Vercel request/response pair

export type MockResult = {
  statusCode: number;
  headers: Record<string, string>;
  body: unknown;
  ended: boolean;
};

interface MockResponse {
  setHeader(name: string, value: string): MockResponse;
  status(code: number): MockResponse;
  json(body: unknown): MockResponse;
  send(body: unknown): MockResponse;
  end(): MockResponse;
}

export function createMockResponse(): { res: VercelResponse; result: MockResult } {
  const result: MockResult = { statusCode: 200, headers: {}, body: undefined, ended: false };
  const res: MockResponse = {
    setHeader(name, value) {
      result.headers[name.toLowerCase()] = value;
      return res;
    },
    status(code) {
      result.statusCode = code;
      return res;
    },
    json(body) {
      result.body = body;
      result.ended = true;
      return res;
    },
    send(body) {
      result.body = body;
      result.ended = true;
      return res;
    },
    end() {
      result.ended = true;
      return res;
    },
  };
  return { res: res as unknown as VercelResponse, result };
}

export function createMockRequest(
  method: string,
  query: Record<string, string | string[]> = {}
): VercelRequest {
  const req = { method, query, headers: {}, body: undefined };
  return req as unknown as VercelRequest;
}
