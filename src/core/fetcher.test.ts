/**
 * fetcher.ts 단위 테스트 (네트워크 호출 없음)
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import axios from 'axios';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { AuthenticatedFetcher, HttpFetcher, fileNameFromUrl } from './fetcher';
import { DownloadError } from './errors';
import { DownloadProgressEvent } from '../types';

// axios 모킹
vi.mock('axios');
const mockedAxios = vi.mocked(axios, true);

const CANONICAL_URL = 'https://deliciousbrains.com/dl/wp-migrate-db-pro-2.6.10.zip';
const FETCH_URL = `${CANONICAL_URL}?licence_key=test-key&site_url=example.com`;

// 스트림 응답 생성
function streamResponse(body: string) {
  return {
    headers: { 'content-length': String(Buffer.byteLength(body)) },
    data: Readable.from([Buffer.from(body)]),
  };
}

describe('fetcher', () => {
  let tempDir: string;

  beforeEach(async () => {
    vi.resetAllMocks();
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'wpmdb-fetcher-'));
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  describe('fileNameFromUrl', () => {
    it('쿼리를 제외한 경로의 파일명', () => {
      expect(fileNameFromUrl(FETCH_URL)).toBe('wp-migrate-db-pro-2.6.10.zip');
    });
  });

  describe('HttpFetcher', () => {
    it('기본 옵션', () => {
      const fetcher = new HttpFetcher();

      expect(fetcher.options.timeout).toBe(300000);
      expect(fetcher.options.headers).toEqual({ 'User-Agent': 'wpmdb-installer/1.0' });
    });

    it('파일 저장 후 경로 반환', async () => {
      mockedAxios.mockResolvedValueOnce(streamResponse('hello') as never);
      const progress: DownloadProgressEvent[] = [];

      const filePath = await new HttpFetcher({ timeout: 1000 }).fetch(CANONICAL_URL, tempDir, (p) =>
        progress.push(p)
      );

      expect(filePath).toBe(path.join(tempDir, 'wp-migrate-db-pro-2.6.10.zip'));
      expect(await fs.readFile(filePath, 'utf8')).toBe('hello');
      expect(progress[progress.length - 1]).toEqual({
        url: CANONICAL_URL,
        progress: 100,
        downloadedBytes: 5,
        totalBytes: 5,
      });
      expect(mockedAxios).toHaveBeenCalledWith(
        expect.objectContaining({ method: 'GET', url: CANONICAL_URL, responseType: 'stream', timeout: 1000 })
      );
    });

    it('HTTP 오류는 DownloadError (상태 코드, 마스킹된 URL)', async () => {
      mockedAxios.mockRejectedValueOnce(
        Object.assign(new Error('Request failed with status code 403'), { response: { status: 403 } })
      );
      mockedAxios.isAxiosError.mockReturnValueOnce(true);

      const error = await new HttpFetcher().fetch(FETCH_URL, tempDir).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DownloadError);
      expect(error instanceof DownloadError && error.statusCode).toBe(403);
      expect(error instanceof DownloadError && error.message).toBe(
        `다운로드 실패 (HTTP 403): ${CANONICAL_URL}?licence_key=***&site_url=example.com`
      );
      expect(error instanceof DownloadError && error.suggestion).toBe(
        '라이선스 키와 사이트 URL이 올바른지 확인하세요.'
      );
    });

    it('네트워크 오류 시 부분 파일 삭제', async () => {
      mockedAxios.mockRejectedValueOnce(new Error('socket hang up'));

      await expect(new HttpFetcher().fetch(CANONICAL_URL, tempDir)).rejects.toThrow(
        `다운로드 실패: ${CANONICAL_URL} (socket hang up)`
      );
      expect(await fs.pathExists(path.join(tempDir, 'wp-migrate-db-pro-2.6.10.zip'))).toBe(false);
    });
  });

  describe('AuthenticatedFetcher', () => {
    it('요청 URL 대신 인증 URL로 다운로드, 파일명은 배포 URL 기준', async () => {
      mockedAxios.mockResolvedValueOnce(streamResponse('zip') as never);
      const progress: DownloadProgressEvent[] = [];

      const filePath = await new AuthenticatedFetcher(FETCH_URL).fetch(CANONICAL_URL, tempDir, (p) =>
        progress.push(p)
      );

      expect(filePath).toBe(path.join(tempDir, 'wp-migrate-db-pro-2.6.10.zip'));
      expect(mockedAxios).toHaveBeenCalledWith(expect.objectContaining({ url: FETCH_URL }));
      // 진행 이벤트에는 키가 노출되지 않음
      expect(progress[0].url).toBe(`${CANONICAL_URL}?licence_key=***&site_url=example.com`);
    });
  });
});
