/**
 * WP Migrate DB Pro 배포 URL 해석기
 * 버전 검증 후 캐시 가능한(비밀값 없는) 배포 URL을 생성
 */

import { PackageVariant } from '../../types';
import { VersionValidationError } from '../errors';

/** 패키지명 */
export const PACKAGE_NAME = 'deliciousbrains/wp-migrate-db-pro';

/** 배포 파일 기본 URL (파일명, 버전, 키 제외) */
export const DIST_BASE_URL = 'https://deliciousbrains.com/dl/';

/** 최신 버전을 의미하는 와일드카드 */
export const WILDCARD_VERSION = '*';

declare const ValidVersionBrand: unique symbol;

/** 검증을 통과한 버전 문자열 ('*' 또는 정확한 버전) */
export type ValidVersion = string & { readonly [ValidVersionBrand]: true };

/**
 * 소스 URL 판별 마커
 * media-files 마커를 먼저 검사해야 함
 */
const VARIANT_MARKERS: ReadonlyArray<[marker: string, variant: PackageVariant]> = [
  ['wp-migrate-db-pro-media-files', 'media-files'],
  ['wp-migrate-db-pro-cli', 'cli'],
];

/** 변형별 파일명 접두사 */
const VARIANT_PREFIXES: Record<PackageVariant, string> = {
  main: 'wp-migrate-db-pro-',
  cli: 'wp-migrate-db-pro-cli-',
  'media-files': 'wp-migrate-db-pro-media-files-',
};

const PACKAGE_VARIANTS: ReadonlyArray<PackageVariant> = ['main', 'cli', 'media-files'];

/** major.minor.patch(.build) - patch만 2자리 허용 */
const EXACT_VERSION_PATTERN = /^\d\.\d\.\d{1,2}(?:\.\d)?$/;

function isValidVersion(version: string): version is ValidVersion {
  return version === WILDCARD_VERSION || EXACT_VERSION_PATTERN.test(version);
}

/**
 * 버전 문자열 검증
 * 다운로드 서버는 정확한 3자리/4자리 버전만 지원하므로 범위 제약은 거부
 *
 * @throws VersionValidationError
 */
export function validateVersion(version: string): ValidVersion {
  if (!isValidVersion(version)) {
    throw new VersionValidationError(PACKAGE_NAME, version);
  }
  return version;
}

/**
 * 소스 URL로 패키지 변형 판별
 */
export function classifyVariant(sourceUrl: string): PackageVariant {
  for (const [marker, variant] of VARIANT_MARKERS) {
    if (sourceUrl.includes(marker)) {
      return variant;
    }
  }
  // 어느 마커도 없으면 본체 플러그인으로 간주
  return 'main';
}

export function isPackageVariant(value: string): value is PackageVariant {
  return PACKAGE_VARIANTS.some((variant) => variant === value);
}

/**
 * 패키지 종류를 나타내는 소스 URL (버전 미포함)
 * composer.json 없이 CLI에서 패키지를 선언할 때 사용
 */
export function variantSourceUrl(variant: PackageVariant): string {
  return `${DIST_BASE_URL}${VARIANT_PREFIXES[variant]}`;
}

/**
 * 배포 URL 생성
 *
 * @example
 * buildCanonicalUrl('cli', validateVersion('4.5.6'))
 * // 'https://deliciousbrains.com/dl/wp-migrate-db-pro-cli-4.5.6.zip'
 */
export function buildCanonicalUrl(variant: PackageVariant, version: ValidVersion): string {
  const versionToken = version === WILDCARD_VERSION ? 'latest' : version;
  return `${DIST_BASE_URL}${VARIANT_PREFIXES[variant]}${versionToken}.zip`;
}

/**
 * 패키지 정보로 배포 URL 해석
 * 패키지 버전마다 URL이 달라야 호스트 캐시가 다른 버전을 재사용하지 않음
 *
 * @throws VersionValidationError
 */
export function resolveDistUrl(packageName: string, sourceUrl: string, prettyVersion: string): string {
  if (!isValidVersion(prettyVersion)) {
    throw new VersionValidationError(packageName, prettyVersion);
  }
  return buildCanonicalUrl(classifyVariant(sourceUrl), prettyVersion);
}

/**
 * 배포 서버 URL인지 확인
 */
export function isDistributionUrl(url: string): boolean {
  return url.includes(DIST_BASE_URL);
}
