/**
 * 환경 변수 조회
 * 라이선스 키와 사이트 URL은 설정 파일이 아니라 환경 변수(또는 .env)에서만 읽음
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { EnvReader } from '../types';
import { EnvFileError, MissingKeyError, MissingSiteUrlError } from './errors';
import logger from '../utils/logger';

/** 라이선스 키 환경 변수명 */
export const KEY_ENV_VARIABLE = 'WP_MIGRATE_DB_PRO_KEY';

/** 사이트 URL 환경 변수명 */
export const SITE_ENV_VARIABLE = 'APP_URL';

/** 사이트 URL에서 제거할 스킴 (순서대로 검사) */
const SCHEME_PREFIXES = ['http://', 'https://'];

export interface EnvReaderOptions {
  /** 기본 환경 (기본값: process.env) */
  env?: NodeJS.ProcessEnv;
  /** .env 파일을 찾을 디렉토리 (기본값: process.cwd()) */
  cwd?: string;
  /** .env 파일 경로 (cwd 기준 상대 경로 허용) */
  envFile?: string;
}

function resolveEnvFilePath(cwd: string, envFile: string): string {
  if (path.isAbsolute(envFile)) {
    return envFile;
  }
  return path.resolve(cwd, envFile);
}

/**
 * .env 파일을 파싱하여 기본 환경에 없는 값만 채움
 * 파일이 없으면 기본 환경을 그대로 사용
 */
function loadDotEnv(base: NodeJS.ProcessEnv, filePath: string): Map<string, string> {
  const values = new Map<string, string>();
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) {
      values.set(key, value);
    }
  }

  if (!fs.pathExistsSync(filePath)) {
    return values;
  }

  let rawContent: string;
  try {
    rawContent = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new EnvFileError(filePath, { cause: error });
  }

  const parsed = dotenv.parse(rawContent);
  let applied = 0;
  for (const [key, value] of Object.entries(parsed)) {
    // 이미 설정된 변수는 덮어쓰지 않음
    if (values.has(key)) {
      continue;
    }
    values.set(key, value);
    applied++;
  }

  logger.debug('.env 파일 로드', { filePath, applied });
  return values;
}

/**
 * 환경 변수 조회기 생성
 * .env 파일은 첫 조회 시 한 번만 로드되며 process.env는 변경하지 않음
 */
export function createEnvReader(options: EnvReaderOptions = {}): EnvReader {
  const base = options.env ?? process.env;
  const filePath = resolveEnvFilePath(options.cwd ?? process.cwd(), options.envFile ?? '.env');
  let values: Map<string, string> | null = null;

  return {
    get(name: string): string | undefined {
      if (!values) {
        values = loadDotEnv(base, filePath);
      }
      return values.get(name);
    },
  };
}

/**
 * 라이선스 키 조회
 *
 * @throws MissingKeyError 값이 없거나 비어 있는 경우
 */
export function getLicenceKey(reader: EnvReader): string {
  const key = reader.get(KEY_ENV_VARIABLE);
  if (!key) {
    throw new MissingKeyError(KEY_ENV_VARIABLE);
  }
  return key;
}

/**
 * 사이트 URL 조회 (http:// 또는 https:// 제거)
 *
 * @throws MissingSiteUrlError 값이 없거나 비어 있는 경우
 */
export function getSiteUrl(reader: EnvReader): string {
  const url = reader.get(SITE_ENV_VARIABLE);
  if (!url) {
    throw new MissingSiteUrlError(SITE_ENV_VARIABLE);
  }

  const prefix = SCHEME_PREFIXES.find((scheme) => url.startsWith(scheme));
  return prefix ? url.slice(prefix.length) : url;
}
