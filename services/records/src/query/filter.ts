export interface Page {
  skip: number;
  limit: number;
}

export function matchesText(value: string, query: string): boolean {
  return value.toLowerCase().includes(query.toLowerCase());
}

/**
 * Case-insensitive containment match on one text field.
 * Full scan on every call; there is no index behind it.
 */
export function searchRecords<R, F extends keyof R>(records: R[], field: F, query?: string): R[] {
  if (!query) return records;
  return records.filter((record) => {
    const value = record[field];
    return typeof value === 'string' && matchesText(value, query);
  });
}

export function paginate<R>(records: R[], { skip, limit }: Page): R[] {
  if (skip < 0 || limit < 0) throw new RangeError('skip and limit must be non-negative');
  return records.slice(skip, skip + limit);
}
