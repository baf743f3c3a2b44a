/**
 * WP Migrate DB Pro 설치 플러그인
 *
 * 패키지 매니저가 공개 레지스트리로 배포되지 않는 유료 플러그인을 받을 수 있도록
 * 두 시점에 개입한다.
 * - 설치/업데이트 직전: 버전이 포함된 배포 URL로 교체 (lock에 기록됨)
 * - 다운로드 직전: 라이선스 키와 사이트 URL을 붙인 URL로 전송 계층 교체 (lock에 기록되지 않음)
 */

import { EnvReader, InstallerHooks, PackageEvent, PreFileDownloadEvent } from '../types';
import { createEnvReader, getLicenceKey, getSiteUrl } from './env';
import { getPackageFromOperation } from './events';
import { AuthenticatedFetcher } from './fetcher';
import { PACKAGE_NAME, isDistributionUrl, resolveDistUrl } from './resolver/versionResolver';
import { composeFetchUrl, maskSecretParameters } from './shared/url-params';
import logger from '../utils/logger';

export class InstallerPlugin implements InstallerHooks {
  private readonly env: EnvReader;

  constructor(env: EnvReader = createEnvReader()) {
    this.env = env;
  }

  /**
   * 배포 URL에 버전 반영
   * 버전마다 URL이 달라야 호스트가 다른 버전의 캐시를 재사용하지 않음
   *
   * @throws VersionValidationError
   */
  onPackageEvent(event: PackageEvent): void {
    const pkg = getPackageFromOperation(event.operation);

    if (pkg.name !== PACKAGE_NAME) {
      return;
    }

    const distUrl = resolveDistUrl(pkg.name, pkg.distUrl, pkg.prettyVersion);
    logger.debug('배포 URL 확정', { name: pkg.name, version: pkg.prettyVersion, distUrl });
    pkg.distUrl = distUrl;
  }

  /**
   * 다운로드 URL에 인증 파라미터 추가
   *
   * @throws MissingKeyError
   * @throws MissingSiteUrlError
   */
  onPreFileDownload(event: PreFileDownloadEvent): void {
    const processedUrl = event.processedUrl;

    if (!isDistributionUrl(processedUrl)) {
      return;
    }

    const fetchUrl = composeFetchUrl(processedUrl, getLicenceKey(this.env), getSiteUrl(this.env));
    const previous = event.getFetcher();

    event.setFetcher(new AuthenticatedFetcher(fetchUrl, previous.options));
    logger.debug('인증 전송 계층으로 교체', { url: maskSecretParameters(fetchUrl) });
  }
}
