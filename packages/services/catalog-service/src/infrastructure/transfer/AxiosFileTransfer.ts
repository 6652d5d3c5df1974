import axios, { type AxiosResponse } from 'axios';
import { getLogger, toError } from '@robin-radio/platform-core';
import type { IFileTransfer, TransferProgress, TransferResult } from '../../application/interfaces/IFileTransfer';
import { DownloadError } from '../../application/errors';

const logger = getLogger('catalog-service-file-transfer');

export interface AxiosFileTransferOptions {
  timeoutMs?: number;
}

export class AxiosFileTransfer implements IFileTransfer {
  private readonly timeoutMs: number;

  constructor(options: AxiosFileTransferOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 5 * 60 * 1000;
  }

  async fetchFile(url: string, onProgress?: (progress: TransferProgress) => void): Promise<TransferResult> {
    let response: AxiosResponse<ArrayBuffer>;
    try {
      response = await axios.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        timeout: this.timeoutMs,
        validateStatus: () => true,
        onDownloadProgress: event => {
          onProgress?.({ receivedBytes: event.loaded, totalBytes: event.total });
        },
      });
    } catch (error) {
      throw DownloadError.transferFailed(url, toError(error));
    }

    if (response.status < 200 || response.status >= 300) {
      logger.debug('Transfer rejected by remote', { status: response.status });
      throw DownloadError.httpStatus(response.status, response.statusText);
    }

    const data = Buffer.from(response.data);
    return { data, totalBytes: data.length };
  }
}
