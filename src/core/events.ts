import { Fetcher, PackageEvent, PackageOperation, PackageRecord, PreFileDownloadEvent } from '../types';

/**
 * 설치/업데이트 작업의 대상 패키지
 * 업데이트 작업은 package 대신 targetPackage를 사용
 */
export function getPackageFromOperation(operation: PackageOperation): PackageRecord {
  if (operation.jobType === 'update') {
    return operation.targetPackage;
  }
  return operation.package;
}

export function createPackageEvent(operation: PackageOperation): PackageEvent {
  return { operation };
}

/**
 * 다운로드 직전 이벤트
 * 핸들러는 processedUrl을 바꿀 수 없고, 이번 다운로드의 전송 계층만 교체 가능
 */
export class FileDownloadEvent implements PreFileDownloadEvent {
  private fetcher: Fetcher;

  constructor(readonly processedUrl: string, fetcher: Fetcher) {
    this.fetcher = fetcher;
  }

  getFetcher(): Fetcher {
    return this.fetcher;
  }

  setFetcher(fetcher: Fetcher): void {
    this.fetcher = fetcher;
  }
}
