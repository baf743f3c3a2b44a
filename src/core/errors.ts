/**
 * 설치 플러그인 에러 정의
 */

/**
 * 에러 옵션
 */
export interface InstallerErrorOptions extends ErrorOptions {
  /** 사용자에게 다음 행동을 안내하는 메시지 */
  suggestion?: string;
}

/**
 * 기본 설치 에러
 */
export class InstallerError extends Error {
  override name = 'InstallerError';
  /** 사용자에게 다음 행동을 안내하는 메시지 */
  readonly suggestion?: string;

  constructor(message: string, options?: InstallerErrorOptions) {
    super(message, options);
    this.suggestion = options?.suggestion;
    // Error 클래스 상속 시 prototype chain 복구
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * 버전 제약 형식 오류
 * 네트워크 요청 전, 패키지 해석 단계에서 발생
 */
export class VersionValidationError extends InstallerError {
  override name = 'VersionValidationError';

  /** 원본 버전 문자열 */
  readonly version: string;

  constructor(packageName: string, version: string) {
    super(
      `${packageName}의 버전 제약은 정확한 버전(3자리 또는 4자리)이어야 합니다. ` +
        `잘못된 버전 문자열 "${version}"`,
      { suggestion: '1.2.3 또는 1.2.3.4 형식, 최신 버전은 "*"를 사용하세요.' }
    );
    Object.setPrototypeOf(this, new.target.prototype);
    this.version = version;
  }
}

/**
 * 라이선스 키 환경 변수 누락
 */
export class MissingKeyError extends InstallerError {
  override name = 'MissingKeyError';

  /** 키를 읽으려던 환경 변수명 */
  readonly variableName: string;

  constructor(variableName: string) {
    super(
      'WP Migrate DB Pro 라이선스 키를 찾을 수 없습니다. ' +
        `환경 변수 ${variableName}로 키를 제공하세요.`,
      { suggestion: `.env 파일 또는 셸에서 ${variableName}를 설정하세요.` }
    );
    Object.setPrototypeOf(this, new.target.prototype);
    this.variableName = variableName;
  }
}

/**
 * 사이트 URL 환경 변수 누락
 */
export class MissingSiteUrlError extends InstallerError {
  override name = 'MissingSiteUrlError';

  readonly variableName: string;

  constructor(variableName: string) {
    super(
      'WP Migrate DB Pro 라이선스에 등록된 사이트 URL을 찾을 수 없습니다. ' +
        `환경 변수 ${variableName}로 사이트 URL을 제공하세요.`,
      { suggestion: `.env 파일 또는 셸에서 ${variableName}를 설정하세요.` }
    );
    Object.setPrototypeOf(this, new.target.prototype);
    this.variableName = variableName;
  }
}

/**
 * .env 파일 읽기 실패
 */
export class EnvFileError extends InstallerError {
  override name = 'EnvFileError';

  readonly filePath: string;

  constructor(filePath: string, options?: InstallerErrorOptions) {
    super(`환경 변수 파일을 읽지 못했습니다: ${filePath}`, {
      suggestion: '파일 접근 권한과 경로를 확인하세요.',
      ...options,
    });
    Object.setPrototypeOf(this, new.target.prototype);
    this.filePath = filePath;
  }
}

/**
 * 다운로드 실패
 */
export class DownloadError extends InstallerError {
  override name = 'DownloadError';

  /** 요청 URL (인증 파라미터 마스킹됨) */
  readonly url: string;
  /** HTTP 상태 코드 */
  readonly statusCode?: number;

  constructor(message: string, url: string, statusCode?: number, options?: InstallerErrorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
    this.url = url;
    this.statusCode = statusCode;
  }
}
