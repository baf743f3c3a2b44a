#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';

// 버전 정보
const VERSION = '1.0.0';

// 메인 프로그램
const program = new Command();

program
  .name('wpmdb-installer')
  .description(chalk.cyan('wpmdb-installer - WP Migrate DB Pro 라이선스 패키지 설치 도구'))
  .version(VERSION, '-v, --version', '버전 정보 표시')
  .helpOption('-h, --help', '도움말 표시');

// resolve 명령어
program
  .command('resolve')
  .description('배포 URL 확인 (비밀값 미포함)')
  .option('-p, --package-url <url>', '패키지 소스 URL', 'wp-migrate-db-pro')
  .requiredOption('-V, --pkg-version <version>', '정확한 버전 (1.2.3, 1.2.3.4) 또는 *')
  .action(async (options) => {
    const { resolveCommand } = await import('./commands/resolve');
    await resolveCommand(options);
  });

// install 명령어
program
  .command('install')
  .description('패키지 해석, lock 파일 기록 후 다운로드')
  .requiredOption('-V, --pkg-version <version>', '정확한 버전 (1.2.3, 1.2.3.4) 또는 *')
  .option('--variant <variants...>', '설치할 패키지 (main, cli, media-files)', ['main'])
  .option('-o, --output <path>', '출력 경로')
  .option('--lock <file>', 'lock 파일 경로')
  .option('--env-file <file>', '환경 변수 파일 경로')
  .option('--concurrency <num>', '동시 다운로드 수')
  .action(async (options) => {
    const { installCommand } = await import('./commands/install');
    await installCommand(options);
  });

// config 명령어
program
  .command('config')
  .description('설정 관리')
  .addCommand(
    new Command('get')
      .description('설정값 조회')
      .argument('[key]', '설정 키')
      .action(async (key) => {
        const { configGet } = await import('./commands/config');
        await configGet(key);
      })
  )
  .addCommand(
    new Command('set')
      .description('설정값 변경')
      .argument('<key>', '설정 키')
      .argument('<value>', '설정값')
      .action(async (key, value) => {
        const { configSet } = await import('./commands/config');
        await configSet(key, value);
      })
  )
  .addCommand(
    new Command('list')
      .description('모든 설정 표시')
      .action(async () => {
        const { configList } = await import('./commands/config');
        await configList();
      })
  )
  .addCommand(
    new Command('reset')
      .description('설정 초기화')
      .action(async () => {
        const { configReset } = await import('./commands/config');
        await configReset();
      })
  );

// 에러 핸들링
program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  console.error(chalk.red(`오류: ${err.message}`));
  process.exit(1);
});

// 파싱 및 실행
program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(`오류: ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
});
