import chalk from 'chalk';
import Table from 'cli-table3';
import { getConfigManager } from '../../core/config';
import { KEY_ENV_VARIABLE, SITE_ENV_VARIABLE } from '../../core/env';
import { reportError } from '../report';

/**
 * 문자열 설정값 파싱 (숫자, 문자열)
 */
export function parseConfigValue(value: string): string | number {
  if (value.trim() !== '' && !isNaN(Number(value))) {
    return Number(value);
  }
  return value;
}

/**
 * 설정값 조회
 */
export async function configGet(key?: string): Promise<void> {
  const config = getConfigManager().getConfig();

  if (key) {
    const value = new Map<string, unknown>(Object.entries(config)).get(key);
    if (value !== undefined) {
      console.log(chalk.cyan(`${key}: `) + chalk.white(JSON.stringify(value)));
    } else {
      console.log(chalk.yellow(`설정 '${key}'를 찾을 수 없습니다`));
    }
  } else {
    console.log(chalk.cyan('\n현재 설정:'));
    console.log(JSON.stringify(config, null, 2));
  }
}

/**
 * 설정값 변경
 */
export async function configSet(key: string, value: string): Promise<void> {
  const configManager = getConfigManager();

  try {
    const parsedValue = parseConfigValue(value);
    configManager.set(key, parsedValue);
    console.log(chalk.green(`✓ 설정이 저장되었습니다: ${key} = ${JSON.stringify(parsedValue)}`));
  } catch (error) {
    reportError(error, '설정 저장 실패');
    process.exit(1);
  }
}

/**
 * 모든 설정 표시
 */
export async function configList(): Promise<void> {
  const config = getConfigManager().getConfig();

  const table = new Table({
    head: [chalk.cyan('설정'), chalk.cyan('값'), chalk.cyan('설명')],
    colWidths: [22, 32, 30],
  });

  const descriptions: Record<string, string> = {
    concurrentDownloads: '동시 다운로드 수',
    downloadTimeoutMs: '다운로드 타임아웃 (ms)',
    outputDir: '플러그인 설치 경로',
    lockFile: 'lock 파일 경로',
    envFile: '환경 변수 파일 경로',
    logLevel: '로그 레벨',
  };

  for (const [key, value] of Object.entries(config)) {
    table.push([key, String(value), descriptions[key] || '-']);
  }

  console.log(chalk.cyan('\n설정 목록:\n'));
  console.log(table.toString());
  console.log(
    chalk.gray(`\n라이선스 키와 사이트 URL은 환경 변수 ${KEY_ENV_VARIABLE}, ${SITE_ENV_VARIABLE}로만 설정합니다.`)
  );
}

/**
 * 설정 초기화
 */
export async function configReset(): Promise<void> {
  try {
    getConfigManager().reset();
    console.log(chalk.green('✓ 설정이 초기화되었습니다'));
  } catch (error) {
    reportError(error, '설정 초기화 실패');
    process.exit(1);
  }
}
