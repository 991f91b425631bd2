import { log, formatDbError } from './logger';

/**
 * Insert a batch; on failure split it in half and retry each half, down to
 * single records. A record that still fails is logged and the error rethrown:
 * the run stops before any later state is saved, so nothing is skipped silently.
 *
 * @param insertFn   - The actual insert function (target-specific)
 * @param itemLabel  - Log-friendly label for a single item (e.g. "orders record 3f2c...")
 */
export const insertWithRetry = async <T>(
  items: T[],
  insertFn: (batch: T[]) => Promise<number>,
  itemLabel: (item: T) => string
): Promise<number> => {
  try {
    return await insertFn(items);
  } catch (err) {
    if (items.length <= 1) {
      const label = items.length === 1 ? itemLabel(items[0]) : 'empty batch';
      log.error(`Failed to insert ${label}\n${formatDbError(err)}`);
      throw err;
    }

    const mid = Math.ceil(items.length / 2);
    const left = items.slice(0, mid);
    const right = items.slice(mid);

    log.warn(`Batch of ${items.length} failed, splitting into ${left.length} + ${right.length}`);

    // sequential: the left half is written before the right half is tried
    const leftCount = await insertWithRetry(left, insertFn, itemLabel);
    const rightCount = await insertWithRetry(right, insertFn, itemLabel);

    return leftCount + rightCount;
  }
};
