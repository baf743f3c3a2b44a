import PQueue from 'p-queue';
import { EventEmitter } from 'eventemitter3';
import * as path from 'path';
import * as fs from 'fs-extra';
import {
  DownloadProgressEvent,
  Fetcher,
  FetcherOptions,
  InstallerHooks,
  InstallItem,
  InstallResult,
  LockEntry,
  LockFile,
  PackageOperation,
} from '../types';
import { createPackageEvent, FileDownloadEvent, getPackageFromOperation } from './events';
import { HttpFetcher } from './fetcher';
import { InstallerError } from './errors';
import logger from '../utils/logger';

// 이벤트 타입
export interface InstallManagerEvents {
  itemStart: (item: InstallItem) => void;
  itemProgress: (item: InstallItem, progress: DownloadProgressEvent) => void;
  itemComplete: (item: InstallItem) => void;
  itemFailed: (item: InstallItem, error: Error) => void;
  allComplete: (result: InstallResult) => void;
}

// 설치 옵션
export interface InstallManagerOptions {
  concurrency?: number;
  fetcherOptions?: FetcherOptions;
  /** 다운로드마다 기본 전송 계층 생성 */
  createFetcher?: (options: FetcherOptions) => Fetcher;
}

// ID 생성
const generateId = (entry: LockEntry): string => {
  return `${entry.name}@${entry.version}#${entry.distUrl}`;
};

function isLockEntry(value: unknown): value is LockEntry {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const fields = new Map(Object.entries(value));
  return ['name', 'version', 'distUrl'].every((key) => typeof fields.get(key) === 'string');
}

/**
 * 호스트 패키지 매니저 역할을 하는 오케스트레이터
 * 1) resolve: 패키지 해석 훅 실행 후 lock 항목 생성
 * 2) download: 항목마다 다운로드 직전 훅을 실행하고, 이벤트에 남은 전송 계층으로 다운로드
 */
export class InstallManager extends EventEmitter<InstallManagerEvents> {
  private readonly hooks: InstallerHooks;
  private readonly concurrency: number;
  private readonly fetcherOptions: FetcherOptions;
  private readonly createFetcher: (options: FetcherOptions) => Fetcher;

  constructor(hooks: InstallerHooks, options: InstallManagerOptions = {}) {
    super();
    this.hooks = hooks;
    this.concurrency = Math.max(1, options.concurrency ?? 2);
    this.fetcherOptions = options.fetcherOptions ?? {};
    this.createFetcher = options.createFetcher ?? ((fetcherOptions) => new HttpFetcher(fetcherOptions));
  }

  /**
   * 패키지 해석
   * 잘못된 버전 등 해석 오류는 그대로 전파되어 전체 단계가 중단됨
   */
  resolve(operations: PackageOperation[]): LockEntry[] {
    return operations.map((operation) => {
      this.hooks.onPackageEvent(createPackageEvent(operation));
      const pkg = getPackageFromOperation(operation);

      return {
        name: pkg.name,
        version: pkg.prettyVersion,
        distUrl: pkg.distUrl,
      };
    });
  }

  /**
   * lock 파일 저장 (배포 URL만 기록)
   */
  async writeLock(filePath: string, entries: LockEntry[]): Promise<LockFile> {
    const lock: LockFile = {
      generatedAt: new Date().toISOString(),
      packages: entries,
    };

    await fs.ensureDir(path.dirname(filePath));
    await fs.writeJson(filePath, lock, { spaces: 2 });
    logger.info('lock 파일 저장', { filePath, count: entries.length });
    return lock;
  }

  /**
   * lock 파일 로드
   */
  async readLock(filePath: string): Promise<LockFile> {
    const raw: unknown = await fs.readJson(filePath);

    if (typeof raw !== 'object' || raw === null) {
      throw new InstallerError(`lock 파일 형식이 올바르지 않습니다: ${filePath}`);
    }
    const fields = new Map(Object.entries(raw));
    const packages: unknown = fields.get('packages');
    const generatedAt: unknown = fields.get('generatedAt');

    if (!Array.isArray(packages) || !packages.every(isLockEntry) || typeof generatedAt !== 'string') {
      throw new InstallerError(`lock 파일 형식이 올바르지 않습니다: ${filePath}`, {
        suggestion: 'lock 파일을 삭제하고 install을 다시 실행하세요.',
      });
    }

    return { generatedAt, packages };
  }

  /**
   * lock 항목 다운로드
   * 한 패키지의 실패(키 누락, 네트워크 오류)는 다른 패키지에 영향을 주지 않음
   */
  async download(entries: LockEntry[], outputPath: string): Promise<InstallResult> {
    const startTime = Date.now();
    const queue = new PQueue({ concurrency: this.concurrency });

    const items = entries.map((entry): InstallItem => ({
      id: generateId(entry),
      entry,
      status: 'pending',
      progress: 0,
    }));

    await queue.addAll(items.map((item) => () => this.downloadItem(item, outputPath)));

    const result: InstallResult = {
      success: items.every((item) => item.status === 'completed'),
      items,
      duration: Date.now() - startTime,
      outputPath,
    };

    logger.info('설치 완료', {
      total: items.length,
      failed: items.filter((item) => item.status === 'failed').length,
      duration: result.duration,
    });
    this.emit('allComplete', result);
    return result;
  }

  private async downloadItem(item: InstallItem, outputPath: string): Promise<void> {
    item.status = 'downloading';
    this.emit('itemStart', item);

    try {
      const event = new FileDownloadEvent(item.entry.distUrl, this.createFetcher(this.fetcherOptions));
      this.hooks.onPreFileDownload(event);

      item.filePath = await event.getFetcher().fetch(item.entry.distUrl, outputPath, (progress) => {
        item.progress = progress.progress;
        this.emit('itemProgress', item, progress);
      });

      item.status = 'completed';
      item.progress = 100;
      this.emit('itemComplete', item);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      item.status = 'failed';
      item.error = err.message;

      logger.error('패키지 다운로드 실패', { name: item.entry.name, version: item.entry.version, error: err.message });
      this.emit('itemFailed', item, err);
    }
  }
}
