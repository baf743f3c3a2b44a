// ============================================
// 패키지 관련 타입
// ============================================

/** WP Migrate DB Pro 배포 패키지 종류 */
export type PackageVariant = 'main' | 'cli' | 'media-files';

/**
 * 호스트 패키지 매니저가 전달하는 패키지 레코드
 * distUrl은 잠금 파일(lock)에 그대로 기록되므로 비밀값을 넣으면 안 됨
 */
export interface PackageRecord {
  /** 패키지명 (예: deliciousbrains/wp-migrate-db-pro) */
  name: string;
  /** 사용자가 선언한 버전 문자열 (예: 2.6.10, *) */
  prettyVersion: string;
  /** 배포 URL */
  distUrl: string;
}

/** 신규 설치 작업 */
export interface InstallOperation {
  jobType: 'install';
  package: PackageRecord;
}

/** 업데이트 작업 */
export interface UpdateOperation {
  jobType: 'update';
  initialPackage: PackageRecord;
  targetPackage: PackageRecord;
}

/** 설치/업데이트 작업 */
export type PackageOperation = InstallOperation | UpdateOperation;

/** 설치/업데이트 직전 이벤트 */
export interface PackageEvent {
  operation: PackageOperation;
}

// ============================================
// 다운로드 관련 타입
// ============================================

/** 다운로드 진행 이벤트 */
export interface DownloadProgressEvent {
  url: string;
  progress: number;
  downloadedBytes: number;
  totalBytes: number;
}

/** 전송 계층 옵션 */
export interface FetcherOptions {
  /** 요청 타임아웃 (ms) */
  timeout?: number;
  /** 추가 요청 헤더 */
  headers?: Record<string, string>;
}

/**
 * 파일 전송 계층
 * 다운로드 한 건마다 이벤트 핸들러가 교체할 수 있음
 */
export interface Fetcher {
  readonly options: FetcherOptions;

  /** url을 destDir에 내려받고 저장된 파일 경로 반환 */
  fetch(
    url: string,
    destDir: string,
    onProgress?: (progress: DownloadProgressEvent) => void
  ): Promise<string>;
}

/** 파일 다운로드 직전 이벤트 */
export interface PreFileDownloadEvent {
  /** 내려받을 URL (잠금 파일에 기록된 값) */
  readonly processedUrl: string;
  getFetcher(): Fetcher;
  setFetcher(fetcher: Fetcher): void;
}

// ============================================
// 플러그인 인터페이스
// ============================================

/**
 * 외부 오케스트레이터가 정해진 시점에 호출하는 훅
 * - onPackageEvent: 설치/업데이트 직전 (배포 URL 확정, lock에 기록됨)
 * - onPreFileDownload: 다운로드 직전 (인증 파라미터 추가, lock에 기록되지 않음)
 */
export interface InstallerHooks {
  onPackageEvent(event: PackageEvent): void;
  onPreFileDownload(event: PreFileDownloadEvent): void;
}

/** 환경 변수 조회 (읽기 전용) */
export interface EnvReader {
  get(name: string): string | undefined;
}

// ============================================
// 잠금 파일 / 설치 결과
// ============================================

/** 잠금 파일 항목 */
export interface LockEntry {
  name: string;
  version: string;
  distUrl: string;
}

/** 잠금 파일 */
export interface LockFile {
  generatedAt: string;
  packages: LockEntry[];
}

/** 설치 아이템 상태 */
export type InstallItemStatus = 'pending' | 'downloading' | 'completed' | 'failed';

/** 설치 아이템 */
export interface InstallItem {
  id: string;
  entry: LockEntry;
  status: InstallItemStatus;
  progress: number;
  filePath?: string;
  error?: string;
}

/** 설치 결과 */
export interface InstallResult {
  success: boolean;
  items: InstallItem[];
  duration: number;
  outputPath: string;
}
