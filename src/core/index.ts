// Core module exports for wpmdb-installer

// Plugin
export { InstallerPlugin } from './plugin';
export { FileDownloadEvent, createPackageEvent, getPackageFromOperation } from './events';

// Resolver
export {
  PACKAGE_NAME,
  DIST_BASE_URL,
  WILDCARD_VERSION,
  validateVersion,
  classifyVariant,
  buildCanonicalUrl,
  resolveDistUrl,
  isDistributionUrl,
  isPackageVariant,
  variantSourceUrl,
} from './resolver/versionResolver';
export type { ValidVersion } from './resolver/versionResolver';

// URL 파라미터
export {
  LICENCE_KEY_PARAM,
  SITE_URL_PARAM,
  formUrlEncode,
  removeParameter,
  addParameter,
  composeFetchUrl,
  buildAuthenticatedUrl,
  maskSecretParameters,
} from './shared/url-params';

// 환경 변수
export { KEY_ENV_VARIABLE, SITE_ENV_VARIABLE, createEnvReader, getLicenceKey, getSiteUrl } from './env';
export type { EnvReaderOptions } from './env';

// 전송 계층
export { HttpFetcher, AuthenticatedFetcher, fileNameFromUrl } from './fetcher';

// Install Manager
export { InstallManager } from './installManager';
export type { InstallManagerEvents, InstallManagerOptions } from './installManager';

// Config
export { ConfigManager, getConfigManager } from './config';
export type { Config } from './config';

// Errors
export {
  InstallerError,
  VersionValidationError,
  MissingKeyError,
  MissingSiteUrlError,
  EnvFileError,
  DownloadError,
} from './errors';
export type { InstallerErrorOptions } from './errors';

// Types
export * from '../types';
