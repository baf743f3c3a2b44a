import chalk from 'chalk';
import { classifyVariant, PACKAGE_NAME, resolveDistUrl } from '../../core/resolver/versionResolver';
import { reportError } from '../report';

// resolve 옵션
interface ResolveOptions {
  packageUrl: string;
  pkgVersion: string;
}

/**
 * resolve 명령어 핸들러
 */
export async function resolveCommand(options: ResolveOptions): Promise<void> {
  try {
    const distUrl = resolveDistUrl(PACKAGE_NAME, options.packageUrl, options.pkgVersion);

    console.log(chalk.cyan('패키지 종류: ') + chalk.white(classifyVariant(options.packageUrl)));
    console.log(chalk.cyan('배포 URL: ') + chalk.white(distUrl));
  } catch (error) {
    reportError(error, '배포 URL 해석 실패');
    process.exit(1);
  }
}
