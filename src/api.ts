import type { BookDetailResponse } from "../api/books/[id]";
import type { BooksResponse } from "../api/books";
import type { FacetsResponse } from "../api/facets";
import { toBooksSearchParams, type BooksQuery } from "./lib/query";

// Empty means same origin (vite proxies /api in dev)
const API_BASE = import.meta.env.VITE_API_BASE || "";

export class ApiError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "ApiError";
    this.status = status;
  }
}

const readError = async (res: Response): Promise<string> => {
  const body: unknown = await res.json().catch(() => null);
  if (body && typeof body === "object" && "error" in body && typeof body.error === "string") {
    return body.error;
  }
  return `Server error (${res.status})`;
};

async function getJson<T>(path: string): Promise<T> {
  const res = await fetch(`${API_BASE}${path}`);
  if (!res.ok) {
    throw new ApiError(res.status, await readError(res));
  }
  const data: T = await res.json();
  return data;
}

export const fetchFacets = () => getJson<FacetsResponse>("/api/facets");

export const fetchBooks = (query: Partial<BooksQuery>) =>
  getJson<BooksResponse>(`/api/books?${toBooksSearchParams({ ...query, format: "json" })}`);

export const fetchBookDetail = (id: string, showSpoilers: boolean) =>
  getJson<BookDetailResponse>(
    `/api/books/${encodeURIComponent(id)}${showSpoilers ? "?spoilers=1" : ""}`
  );

export const booksCsvUrl = (query: Partial<BooksQuery>) =>
  `${API_BASE}/api/books?${toBooksSearchParams({ ...query, surprise: false, format: "csv" })}`;

export type { BookDetailResponse, BooksResponse, FacetsResponse };
