/**
 * InstallManager 단위 테스트
 *
 * 네트워크 호출 없이 해석/lock/다운로드 흐름을 테스트합니다.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import axios from 'axios';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { InstallManager } from './installManager';
import { InstallerPlugin } from './plugin';
import { InstallerError, MissingKeyError, VersionValidationError } from './errors';
import { PACKAGE_NAME, variantSourceUrl } from './resolver/versionResolver';
import {
  DownloadProgressEvent,
  EnvReader,
  Fetcher,
  FetcherOptions,
  InstallerHooks,
  LockEntry,
  PackageOperation,
  PreFileDownloadEvent,
} from '../types';

vi.mock('axios');
const mockedAxios = vi.mocked(axios, true);

// 호출 URL을 기록하는 전송 계층
class RecordingFetcher implements Fetcher {
  readonly calls: string[] = [];

  constructor(readonly options: FetcherOptions = {}) {}

  async fetch(
    url: string,
    destDir: string,
    onProgress?: (progress: DownloadProgressEvent) => void
  ): Promise<string> {
    this.calls.push(url);
    onProgress?.({ url, progress: 50, downloadedBytes: 1, totalBytes: 2 });
    return path.join(destDir, path.basename(url));
  }
}

const memoryEnv = (values: Record<string, string>): EnvReader => ({
  get: (name) => values[name],
});

const installOf = (version: string, variant: 'main' | 'cli' | 'media-files'): PackageOperation => ({
  jobType: 'install',
  package: { name: PACKAGE_NAME, prettyVersion: version, distUrl: variantSourceUrl(variant) },
});

describe('InstallManager', () => {
  let tempDir: string;

  beforeEach(async () => {
    vi.resetAllMocks();
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'wpmdb-install-'));
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  describe('resolve', () => {
    it('패키지마다 배포 URL이 담긴 lock 항목 생성', () => {
      const manager = new InstallManager(new InstallerPlugin(memoryEnv({})));

      const entries = manager.resolve([installOf('*', 'main'), installOf('4.5.6', 'cli')]);

      expect(entries).toEqual([
        {
          name: PACKAGE_NAME,
          version: '*',
          distUrl: 'https://deliciousbrains.com/dl/wp-migrate-db-pro-latest.zip',
        },
        {
          name: PACKAGE_NAME,
          version: '4.5.6',
          distUrl: 'https://deliciousbrains.com/dl/wp-migrate-db-pro-cli-4.5.6.zip',
        },
      ]);
    });

    it('잘못된 버전이 있으면 전체 해석 중단', () => {
      const manager = new InstallManager(new InstallerPlugin(memoryEnv({})));

      expect(() => manager.resolve([installOf('2.6.10', 'main'), installOf('2.x', 'cli')])).toThrow(
        VersionValidationError
      );
    });
  });

  describe('lock 파일', () => {
    it('저장 후 다시 읽기', async () => {
      const manager = new InstallManager(new InstallerPlugin(memoryEnv({})));
      const lockPath = path.join(tempDir, 'nested', 'wpmdb.lock.json');
      const entries: LockEntry[] = [
        { name: PACKAGE_NAME, version: '2.6.10', distUrl: 'https://deliciousbrains.com/dl/wp-migrate-db-pro-2.6.10.zip' },
      ];

      const written = await manager.writeLock(lockPath, entries);
      const read = await manager.readLock(lockPath);

      expect(read).toEqual(written);
      expect(read.packages).toEqual(entries);
    });

    it('형식이 잘못된 lock 파일은 에러', async () => {
      const manager = new InstallManager(new InstallerPlugin(memoryEnv({})));
      const lockPath = path.join(tempDir, 'broken.lock.json');
      await fs.writeJson(lockPath, { packages: [{ name: PACKAGE_NAME }] });

      await expect(manager.readLock(lockPath)).rejects.toThrow(InstallerError);
    });
  });

  describe('download', () => {
    const entries: LockEntry[] = [
      { name: PACKAGE_NAME, version: '2.6.10', distUrl: 'https://deliciousbrains.com/dl/wp-migrate-db-pro-2.6.10.zip' },
      { name: PACKAGE_NAME, version: '2.6.10', distUrl: 'https://deliciousbrains.com/dl/wp-migrate-db-pro-cli-2.6.10.zip' },
    ];

    it('다운로드 직전 훅이 교체한 전송 계층 사용', async () => {
      const replacement = new RecordingFetcher();
      const hooks: InstallerHooks = {
        onPackageEvent: vi.fn(),
        onPreFileDownload: (event: PreFileDownloadEvent) => event.setFetcher(replacement),
      };
      const defaults: RecordingFetcher[] = [];
      const manager = new InstallManager(hooks, {
        fetcherOptions: { timeout: 1234 },
        createFetcher: (options) => {
          const fetcher = new RecordingFetcher(options);
          defaults.push(fetcher);
          return fetcher;
        },
      });

      const result = await manager.download(entries, tempDir);

      expect(result.success).toBe(true);
      expect(replacement.calls.sort()).toEqual(entries.map((entry) => entry.distUrl).sort());
      expect(defaults).toHaveLength(2);
      expect(defaults[0].options).toEqual({ timeout: 1234 });
      expect(defaults.every((fetcher) => fetcher.calls.length === 0)).toBe(true);
    });

    it('한 패키지의 실패는 다른 패키지에 영향 없음', async () => {
      const hooks: InstallerHooks = {
        onPackageEvent: vi.fn(),
        onPreFileDownload: (event: PreFileDownloadEvent) => {
          if (event.processedUrl.includes('-cli-')) {
            throw new MissingKeyError('WP_MIGRATE_DB_PRO_KEY');
          }
        },
      };
      const manager = new InstallManager(hooks, { createFetcher: (options) => new RecordingFetcher(options) });
      const failed = vi.fn();
      const completed = vi.fn();
      const allComplete = vi.fn();
      manager.on('itemFailed', failed);
      manager.on('itemComplete', completed);
      manager.on('allComplete', allComplete);

      const result = await manager.download(entries, tempDir);

      expect(result.success).toBe(false);
      expect(result.items.map((item) => item.status)).toEqual(['completed', 'failed']);
      expect(result.items[0].filePath).toBe(path.join(tempDir, 'wp-migrate-db-pro-2.6.10.zip'));
      expect(result.items[1].error).toBe(new MissingKeyError('WP_MIGRATE_DB_PRO_KEY').message);
      expect(failed).toHaveBeenCalledTimes(1);
      expect(failed.mock.calls[0][1]).toBeInstanceOf(MissingKeyError);
      expect(completed).toHaveBeenCalledTimes(1);
      expect(allComplete).toHaveBeenCalledWith(result);
    });

    it('진행 이벤트 전달', async () => {
      const hooks: InstallerHooks = { onPackageEvent: vi.fn(), onPreFileDownload: vi.fn() };
      const manager = new InstallManager(hooks, { createFetcher: (options) => new RecordingFetcher(options) });
      const onProgress = vi.fn();
      manager.on('itemProgress', onProgress);

      await manager.download(entries.slice(0, 1), tempDir);

      expect(onProgress).toHaveBeenCalledTimes(1);
      expect(onProgress.mock.calls[0][1]).toEqual({
        url: entries[0].distUrl,
        progress: 50,
        downloadedBytes: 1,
        totalBytes: 2,
      });
    });
  });

  describe('플러그인 연동', () => {
    it('lock 파일에는 키가 없고 다운로드 요청에만 키가 포함됨', async () => {
      mockedAxios.mockResolvedValueOnce({
        headers: { 'content-length': '3' },
        data: Readable.from([Buffer.from('zip')]),
      } as never);
      const plugin = new InstallerPlugin(
        memoryEnv({ WP_MIGRATE_DB_PRO_KEY: 'test-secret', APP_URL: 'https://example.com' })
      );
      const manager = new InstallManager(plugin);
      const lockPath = path.join(tempDir, 'wpmdb.lock.json');

      const entries = manager.resolve([installOf('2.6.10', 'main')]);
      await manager.writeLock(lockPath, entries);
      const lock = await manager.readLock(lockPath);
      const result = await manager.download(lock.packages, path.join(tempDir, 'plugins'));

      expect(await fs.readFile(lockPath, 'utf8')).not.toContain('test-secret');
      expect(lock.packages[0].distUrl).toBe('https://deliciousbrains.com/dl/wp-migrate-db-pro-2.6.10.zip');
      expect(result.success).toBe(true);
      expect(result.items[0].filePath).toBe(path.join(tempDir, 'plugins', 'wp-migrate-db-pro-2.6.10.zip'));
      expect(mockedAxios).toHaveBeenCalledWith(
        expect.objectContaining({
          url: 'https://deliciousbrains.com/dl/wp-migrate-db-pro-2.6.10.zip?licence_key=test-secret&site_url=example.com',
        })
      );
    });
  });
});
