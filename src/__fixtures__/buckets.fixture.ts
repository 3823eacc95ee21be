export function bucketRecord(
  id: string,
  name: string,
  target: { id: string; descriptor?: string } = { id: 'T1', descriptor: 'sales_orders' }
): Record<string, unknown> {
  return {
    id,
    name,
    state: { descriptor: 'New' },
    operation: { id: 'Operation_Type=TruncateAndInsert' },
    targetDataset: target,
  };
}

/**
 * `count` buckets named `<prefix>_<offset + i>`.
 */
export function bucketPage(count: number, offset: number, prefix: string): Array<Record<string, unknown>> {
  return Array.from({ length: count }, (_, i) => bucketRecord(`b-${offset + i}`, `${prefix}_${offset + i}`));
}
