/**
 * Helpers for classifying AWS SDK failures (DynamoDB conditional writes, S3 reads).
 */

export function isConditionalCheckFailed(error: unknown): boolean {
  return error instanceof Error && error.name === 'ConditionalCheckFailedException';
}

export function isTransactionCanceled(error: unknown): boolean {
  return error instanceof Error && error.name === 'TransactionCanceledException';
}

/**
 * Per-item cancellation codes of a TransactionCanceledException, in TransactItems order
 * ('None' for items that did not fail). Empty for any other error.
 */
export function transactionCancellationCodes(error: unknown): string[] {
  if (!isTransactionCanceled(error) || !(error instanceof Error) || !('CancellationReasons' in error)) {
    return [];
  }
  const reasons = error.CancellationReasons;
  if (!Array.isArray(reasons)) {
    return [];
  }
  return reasons.map((reason: unknown) => {
    if (typeof reason === 'object' && reason !== null && 'Code' in reason && typeof reason.Code === 'string') {
      return reason.Code;
    }
    return 'None';
  });
}

/**
 * S3 GetObject on a missing key (NoSuchKey, or NotFound from some S3-compatible stores)
 */
export function isObjectNotFound(error: unknown): boolean {
  return error instanceof Error && (error.name === 'NoSuchKey' || error.name === 'NotFound');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
