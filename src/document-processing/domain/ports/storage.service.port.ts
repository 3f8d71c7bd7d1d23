export interface StorageHealth {
  status: 'healthy' | 'unhealthy';
  bucket?: string;
  accessible?: boolean;
  error?: string;
}

export interface StorageServicePort {
  /**
   * Write an object, overwriting any previous object under the same key.
   * Rejects with StorageError on failure.
   * Not cancellable: the pipeline checks for cancellation before the write
   * starts, and a write in progress is allowed to finish.
   * @returns Location reference (gs://bucket/key)
   */
  put(key: string, fileBuffer: Buffer, contentType: string): Promise<string>;

  /**
   * Report whether the configured bucket is reachable with current credentials
   */
  healthCheck(): Promise<StorageHealth>;
}
