export interface BatchProcessingOptions {
  /**
   * Maximum number of concurrent promises
   * @default 5
   */
  concurrencyLimit?: number;
}

export type BatchResult<R> =
  | {
      success: true;
      value: R;
      index: number;
    }
  | {
      success: false;
      error: Error;
      index: number;
    };

function isSuccessResult<R>(
  result: BatchResult<R>,
): result is { success: true; value: R; index: number } {
  return result.success === true;
}

/**
 * Process an array of items in chunks with controlled concurrency.
 * Results keep the input order; a rejected item never stops the batch.
 *
 * @example
 * const results = await batchProcessWithLimit(
 *   payments,
 *   (payment) => service.completePayment(payment.externalPaymentId),
 *   { concurrencyLimit: 5 },
 * );
 */
export async function batchProcessWithLimit<T, R>(
  items: T[],
  processor: (item: T, index: number) => Promise<R>,
  options: BatchProcessingOptions = {},
): Promise<BatchResult<R>[]> {
  const { concurrencyLimit = 5 } = options;
  const results: BatchResult<R>[] = [];

  for (let i = 0; i < items.length; i += concurrencyLimit) {
    const chunk = items.slice(i, i + concurrencyLimit);

    const chunkResults = await Promise.all(
      chunk.map((item, chunkIndex) => {
        const index = i + chunkIndex;
        return processor(item, index).then(
          (value): BatchResult<R> => ({ success: true, value, index }),
          (error: unknown): BatchResult<R> => ({
            success: false,
            error: error instanceof Error ? error : new Error(String(error)),
            index,
          }),
        );
      }),
    );

    results.push(...chunkResults);
  }

  return results;
}

/**
 * Process items in batches and collect errors separately
 */
export async function batchProcessWithErrors<T, R>(
  items: T[],
  processor: (item: T, index: number) => Promise<R>,
  options: BatchProcessingOptions = {},
): Promise<{
  successful: R[];
  failed: Array<{ item: T; error: Error; index: number }>;
}> {
  const results = await batchProcessWithLimit(items, processor, options);

  const successful: R[] = [];
  const failed: Array<{ item: T; error: Error; index: number }> = [];

  results.forEach((result) => {
    if (isSuccessResult(result)) {
      successful.push(result.value);
    } else {
      failed.push({
        item: items[result.index],
        error: result.error,
        index: result.index,
      });
    }
  });

  return { successful, failed };
}
