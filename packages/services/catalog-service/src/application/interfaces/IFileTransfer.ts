export interface TransferProgress {
  receivedBytes: number;
  totalBytes?: number;
}

export interface TransferResult {
  data: Buffer;
  totalBytes: number;
}

/**
 * Whole-file, non-resumable fetch. Non-2xx responses reject with `HTTP <status>: <statusText>`.
 */
export interface IFileTransfer {
  fetchFile(url: string, onProgress?: (progress: TransferProgress) => void): Promise<TransferResult>;
}
