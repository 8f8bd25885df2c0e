import { ValidationError } from "../errors";

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

export type PaginationInfo = {
  page: number;
  pageSize: number;
  totalCount: number;
  totalPages: number;
};

export function checkPage(page: number, pageSize: number): void {
  if (!Number.isInteger(page) || page < 1) {
    throw new ValidationError("page must be an integer >= 1");
  }
  if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
    throw new ValidationError(`page_size must be an integer between 1 and ${MAX_PAGE_SIZE}`);
  }
  // the offset goes to the server as a bind parameter and must stay exact
  if (!Number.isSafeInteger(pageOffset(page, pageSize))) {
    throw new ValidationError("page is too large");
  }
}

export function pageOffset(page: number, pageSize: number): number {
  return (page - 1) * pageSize;
}

export function buildPagination(page: number, pageSize: number, totalCount: number): PaginationInfo {
  return { page, pageSize, totalCount, totalPages: Math.ceil(totalCount / pageSize) };
}
