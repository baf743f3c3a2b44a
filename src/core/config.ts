import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';

// 설정 인터페이스 정의
// 라이선스 키 등 비밀값은 여기에 저장하지 않음 (환경 변수 전용)
export interface Config {
  // 다운로드 설정
  concurrentDownloads: number;
  downloadTimeoutMs: number;

  // 설치 설정
  outputDir: string;
  lockFile: string;
  envFile: string;

  // 기타 설정
  logLevel: 'error' | 'warn' | 'info' | 'debug';
}

// 기본 설정값
const DEFAULT_CONFIG: Config = {
  concurrentDownloads: 2,
  downloadTimeoutMs: 300000, // 5분
  outputDir: './wp-content/plugins',
  lockFile: 'wpmdb-installer.lock.json',
  envFile: '.env',
  logLevel: 'info',
};

const LOG_LEVELS: ReadonlyArray<Config['logLevel']> = ['error', 'warn', 'info', 'debug'];

function isLogLevel(value: unknown): value is Config['logLevel'] {
  return LOG_LEVELS.some((level) => level === value);
}

function isConfigKey(key: string): key is keyof Config {
  return Object.prototype.hasOwnProperty.call(DEFAULT_CONFIG, key);
}

/**
 * 저장된 원본 설정을 기본값과 병합 (알 수 없는 키, 잘못된 타입은 무시)
 */
function mergeWithDefaults(raw: unknown): Config {
  const config: Config = { ...DEFAULT_CONFIG };
  if (typeof raw !== 'object' || raw === null) {
    return config;
  }

  const entries = new Map(Object.entries(raw));
  const concurrent = entries.get('concurrentDownloads');
  if (typeof concurrent === 'number' && concurrent > 0) {
    config.concurrentDownloads = concurrent;
  }
  const timeout = entries.get('downloadTimeoutMs');
  if (typeof timeout === 'number' && timeout > 0) {
    config.downloadTimeoutMs = timeout;
  }
  for (const key of ['outputDir', 'lockFile', 'envFile'] as const) {
    const value = entries.get(key);
    if (typeof value === 'string' && value) {
      config[key] = value;
    }
  }
  const logLevel = entries.get('logLevel');
  if (isLogLevel(logLevel)) {
    config.logLevel = logLevel;
  }
  return config;
}

export class ConfigManager {
  private configDir: string;
  private configPath: string;
  private logsDir: string;

  constructor(configDir = path.join(os.homedir(), '.wpmdb-installer')) {
    this.configDir = configDir;
    this.configPath = path.join(this.configDir, 'settings.json');
    this.logsDir = path.join(this.configDir, 'logs');
  }

  /**
   * 필요한 디렉토리들을 생성합니다.
   */
  async ensureDirectories(): Promise<void> {
    await fs.ensureDir(this.configDir);
    await fs.ensureDir(this.logsDir);
  }

  /**
   * 설정을 로드합니다. 파일이 없으면 기본값을 생성합니다.
   */
  async loadConfig(): Promise<Config> {
    await this.ensureDirectories();

    if (await fs.pathExists(this.configPath)) {
      const rawConfig: unknown = await fs.readJson(this.configPath);
      // 저장된 설정과 기본값을 병합 (새로운 설정 항목 대응)
      return mergeWithDefaults(rawConfig);
    }

    // 기본 설정 생성 및 저장
    await this.saveConfig(DEFAULT_CONFIG);
    return { ...DEFAULT_CONFIG };
  }

  /**
   * 설정을 저장합니다.
   */
  async saveConfig(config: Config): Promise<void> {
    await this.ensureDirectories();
    await fs.writeJson(this.configPath, config, { spaces: 2 });
  }

  /**
   * 설정을 기본값으로 초기화합니다.
   */
  async resetToDefaults(): Promise<Config> {
    await this.saveConfig(DEFAULT_CONFIG);
    return { ...DEFAULT_CONFIG };
  }

  /**
   * 특정 설정값을 업데이트합니다.
   */
  async updateConfig(updates: Partial<Config>): Promise<Config> {
    const currentConfig = await this.loadConfig();
    const newConfig = { ...currentConfig, ...updates };
    await this.saveConfig(newConfig);
    return newConfig;
  }

  /**
   * 설정 디렉토리 경로를 반환합니다.
   */
  getConfigDir(): string {
    return this.configDir;
  }

  /**
   * 로그 디렉토리 경로를 반환합니다.
   */
  getLogsDir(): string {
    return this.logsDir;
  }

  /**
   * 설정을 동기적으로 로드합니다 (CLI용).
   */
  getConfig(): Config {
    if (fs.pathExistsSync(this.configPath)) {
      const rawConfig: unknown = fs.readJsonSync(this.configPath, { throws: false });
      return mergeWithDefaults(rawConfig);
    }
    return { ...DEFAULT_CONFIG };
  }

  /**
   * 설정값을 동기적으로 설정합니다 (CLI용).
   */
  set(key: string, value: unknown): void {
    if (!isConfigKey(key)) {
      throw new Error(`알 수 없는 설정 키: ${key}`);
    }

    fs.ensureDirSync(this.configDir);
    const config: Record<string, unknown> = { ...this.getConfig() };
    config[key] = value;

    const merged = mergeWithDefaults(config);
    if (merged[key] !== value) {
      throw new Error(`잘못된 설정값: ${key} = ${JSON.stringify(value)}`);
    }
    fs.writeJsonSync(this.configPath, merged, { spaces: 2 });
  }

  /**
   * 설정을 동기적으로 초기화합니다 (CLI용).
   */
  reset(): void {
    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, DEFAULT_CONFIG, { spaces: 2 });
  }
}

// 싱글톤 인스턴스
let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager();
  }
  return configManagerInstance;
}
