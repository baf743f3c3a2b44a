/**
 * 배포 파일 전송 계층
 * axios 스트림으로 파일을 내려받음
 */

import axios from 'axios';
import * as fs from 'fs-extra';
import * as path from 'path';
import { DownloadProgressEvent, Fetcher, FetcherOptions } from '../types';
import { DownloadError } from './errors';
import { maskSecretParameters } from './shared/url-params';
import logger from '../utils/logger';

/** 기본 다운로드 타임아웃: 5분 */
const DEFAULT_TIMEOUT = 300000;

/**
 * URL 경로의 마지막 부분을 파일명으로 사용
 */
export function fileNameFromUrl(url: string): string {
  return path.basename(new URL(url).pathname);
}

/**
 * HTTP 다운로더
 */
export class HttpFetcher implements Fetcher {
  readonly options: FetcherOptions;

  constructor(options: FetcherOptions = {}) {
    this.options = {
      timeout: options.timeout ?? DEFAULT_TIMEOUT,
      headers: { 'User-Agent': 'wpmdb-installer/1.0', ...options.headers },
    };
  }

  async fetch(
    url: string,
    destDir: string,
    onProgress?: (progress: DownloadProgressEvent) => void
  ): Promise<string> {
    return this.download(url, destDir, fileNameFromUrl(url), onProgress);
  }

  /**
   * 요청 URL과 저장 파일명을 분리하여 다운로드
   * 인증 파라미터가 붙은 URL도 파일명은 배포 URL 기준으로 저장
   */
  async download(
    url: string,
    destDir: string,
    fileName: string,
    onProgress?: (progress: DownloadProgressEvent) => void
  ): Promise<string> {
    const safeUrl = maskSecretParameters(url);
    const filePath = path.join(destDir, fileName);

    await fs.ensureDir(destDir);

    try {
      const response = await axios({
        method: 'GET',
        url,
        responseType: 'stream',
        timeout: this.options.timeout,
        headers: this.options.headers,
      });

      const totalBytes = Number(response.headers['content-length'] ?? 0) || 0;
      let downloadedBytes = 0;

      const writer = fs.createWriteStream(filePath);

      response.data.on('data', (chunk: Buffer) => {
        downloadedBytes += chunk.length;

        if (onProgress) {
          onProgress({
            url: safeUrl,
            progress: totalBytes > 0 ? (downloadedBytes / totalBytes) * 100 : 0,
            downloadedBytes,
            totalBytes,
          });
        }
      });

      response.data.pipe(writer);

      await new Promise<void>((resolve, reject) => {
        writer.on('finish', resolve);
        writer.on('error', reject);
        response.data.on('error', reject);
      });

      logger.info('배포 파일 다운로드 완료', { url: safeUrl, filePath, bytes: downloadedBytes });
      return filePath;
    } catch (error) {
      await fs.remove(filePath);

      const statusCode = axios.isAxiosError(error) ? error.response?.status : undefined;
      const reason = error instanceof Error ? error.message : String(error);
      logger.error('배포 파일 다운로드 실패', { url: safeUrl, statusCode, reason });

      throw new DownloadError(
        statusCode
          ? `다운로드 실패 (HTTP ${statusCode}): ${safeUrl}`
          : `다운로드 실패: ${safeUrl} (${reason})`,
        safeUrl,
        statusCode,
        {
          cause: error,
          suggestion:
            statusCode === 401 || statusCode === 403
              ? '라이선스 키와 사이트 URL이 올바른지 확인하세요.'
              : undefined,
        }
      );
    }
  }
}

/**
 * 인증 파라미터가 포함된 URL로 다운로드하는 전송 계층
 * 요청받은 URL 대신 생성 시 지정된 fetchUrl을 사용
 */
export class AuthenticatedFetcher implements Fetcher {
  readonly options: FetcherOptions;
  private readonly http: HttpFetcher;

  constructor(readonly fetchUrl: string, options: FetcherOptions = {}) {
    this.options = options;
    this.http = new HttpFetcher(options);
  }

  async fetch(
    url: string,
    destDir: string,
    onProgress?: (progress: DownloadProgressEvent) => void
  ): Promise<string> {
    return this.http.download(this.fetchUrl, destDir, fileNameFromUrl(url), onProgress);
  }
}
