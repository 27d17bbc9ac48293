import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { ClidefConfig, ResolvedConfig } from './types';
import { parseDuration } from './utils';
import { cliLogger } from '@core/utils/logger';

export const DEFAULT_HTTP_TIMEOUT_MS = 30000;
export const DEFAULT_PRINT_WIDTH = 100;
export const DEFAULT_BUILD_TARGET = 'node20';

/**
 * Load clidef configuration from both global and project locations
 */
export class ConfigLoader {
  private globalConfigPath: string;
  private projectConfigPath: string;
  private cachedConfig?: ClidefConfig;

  constructor(projectPath?: string) {
    // Global config location: ~/.config/clidef.json
    this.globalConfigPath = path.join(os.homedir(), '.config', 'clidef.json');

    // Project config location: <project>/clidef.config.json
    this.projectConfigPath = path.join(projectPath ?? process.cwd(), 'clidef.config.json');
  }

  /**
   * Load and merge configurations
   */
  load(): ClidefConfig {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const globalConfig = this.loadConfigFile(this.globalConfigPath);
    const projectConfig = this.loadConfigFile(this.projectConfigPath);

    // Project overrides global, section by section
    this.cachedConfig = {
      http: { ...globalConfig.http, ...projectConfig.http },
      format: { ...globalConfig.format, ...projectConfig.format },
      build: { ...globalConfig.build, ...projectConfig.build }
    };

    return this.cachedConfig;
  }

  /**
   * Resolve configuration to runtime values
   */
  resolve(config: ClidefConfig = this.load()): ResolvedConfig {
    return {
      http: {
        timeoutMs: config.http?.timeout !== undefined
          ? parseDuration(config.http.timeout)
          : DEFAULT_HTTP_TIMEOUT_MS
      },
      format: {
        enabled: config.format?.enabled ?? true,
        printWidth: config.format?.printWidth ?? DEFAULT_PRINT_WIDTH
      },
      build: {
        target: config.build?.target ?? DEFAULT_BUILD_TARGET,
        minify: config.build?.minify ?? false
      }
    };
  }

  private loadConfigFile(filePath: string): ClidefConfig {
    try {
      if (fs.existsSync(filePath)) {
        const content = fs.readFileSync(filePath, 'utf8');
        const parsed: unknown = JSON.parse(content);
        if (isConfigObject(parsed)) {
          return parsed;
        }
        cliLogger.warn(`Ignoring config ${filePath}: expected a JSON object`);
      }
    } catch (error) {
      cliLogger.warn(`Failed to load config from ${filePath}`, { error: String(error) });
    }

    return {};
  }
}

function isConfigObject(value: unknown): value is ClidefConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
