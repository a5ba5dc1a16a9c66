/** For INSERT/UPDATE … RETURNING statements that always produce a row. */
export function firstRow<T>(rows: T[]): T {
  const [row] = rows;
  if (row === undefined) throw new Error('Expected a row to be returned');
  return row;
}
