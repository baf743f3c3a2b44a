import cliProgress from 'cli-progress';
import chalk from 'chalk';
import * as path from 'path';
import { PackageOperation } from '../../types';
import { getConfigManager } from '../../core/config';
import { createEnvReader } from '../../core/env';
import { InstallManager } from '../../core/installManager';
import { InstallerPlugin } from '../../core/plugin';
import { isPackageVariant, PACKAGE_NAME, variantSourceUrl } from '../../core/resolver/versionResolver';
import logger from '../../utils/logger';
import { reportError } from '../report';

// install 옵션
interface InstallOptions {
  pkgVersion: string;
  variant: string[];
  output?: string;
  lock?: string;
  envFile?: string;
  concurrency?: string;
}

/**
 * 선택한 패키지 종류마다 신규 설치 작업 생성
 */
export function buildOperations(version: string, variants: string[]): PackageOperation[] {
  const unique = [...new Set(variants)];

  return unique.map((variant): PackageOperation => {
    if (!isPackageVariant(variant)) {
      throw new Error(`알 수 없는 패키지 종류: ${variant} (main, cli, media-files 중 선택)`);
    }
    return {
      jobType: 'install',
      package: {
        name: PACKAGE_NAME,
        prettyVersion: version,
        distUrl: variantSourceUrl(variant),
      },
    };
  });
}

/**
 * install 명령어 핸들러
 */
export async function installCommand(options: InstallOptions): Promise<void> {
  const config = getConfigManager().getConfig();
  await logger.initialize();

  const outputPath = path.resolve(options.output ?? config.outputDir);
  const lockPath = path.resolve(options.lock ?? config.lockFile);
  const concurrency = options.concurrency ? parseInt(options.concurrency, 10) : config.concurrentDownloads;

  const plugin = new InstallerPlugin(createEnvReader({ envFile: options.envFile ?? config.envFile }));
  const manager = new InstallManager(plugin, {
    concurrency,
    fetcherOptions: { timeout: config.downloadTimeoutMs },
  });

  // 1단계: 패키지 해석 + lock 기록 (네트워크 요청 없음)
  try {
    const entries = manager.resolve(buildOperations(options.pkgVersion, options.variant));
    await manager.writeLock(lockPath, entries);

    console.log(chalk.green(`✓ ${entries.length}개 패키지 해석 완료`));
    for (const entry of entries) {
      console.log(chalk.gray(`  ${entry.distUrl}`));
    }
    console.log(chalk.cyan(`\nlock 파일: ${lockPath}`));
    console.log(chalk.cyan(`출력 경로: ${outputPath}\n`));
  } catch (error) {
    reportError(error, '패키지 해석 실패');
    process.exit(1);
  }

  // 2단계: 다운로드
  const lock = await manager.readLock(lockPath);

  const multibar = new cliProgress.MultiBar(
    {
      clearOnComplete: false,
      hideCursor: true,
      format: ' {bar} | {filename} | {percentage}%',
    },
    cliProgress.Presets.shades_classic
  );
  const bars = new Map<string, cliProgress.SingleBar>();

  manager.on('itemStart', (item) => {
    bars.set(item.id, multibar.create(100, 0, { filename: path.basename(item.entry.distUrl) }));
  });
  manager.on('itemProgress', (item) => {
    bars.get(item.id)?.update(Math.round(item.progress));
  });
  manager.on('itemComplete', (item) => {
    bars.get(item.id)?.update(100);
  });
  const failures = new Map<string, Error>();
  manager.on('itemFailed', (item, error) => {
    failures.set(item.id, error);
  });

  const result = await manager.download(lock.packages, outputPath);
  multibar.stop();

  console.log('');
  for (const item of result.items) {
    if (item.status === 'completed') {
      console.log(chalk.green(`✓ ${path.basename(item.entry.distUrl)} → ${item.filePath}`));
    } else {
      reportError(failures.get(item.id) ?? item.error, `✗ ${path.basename(item.entry.distUrl)} 실패`);
    }
  }

  if (!result.success) {
    process.exit(1);
  }
  console.log(chalk.green('\n✓ 설치 완료!'));
}
