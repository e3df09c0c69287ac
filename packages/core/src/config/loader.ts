import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import {
  BenchConfigSchema,
  ConfigError,
  formatConfigIssues,
  type BenchConfig,
} from '@contentbench/shared';

export const DEFAULT_CONFIG_FILE = 'contentbench.yaml';

export interface ConfigOptions {
  /** Explicit --config path; must exist */
  configPath?: string;
  /** Directory searched for contentbench.yaml and used to resolve relative paths */
  cwd?: string;
  /** CLI overrides */
  flags?: { outputDir?: string };
}

export type LoadedConfig = BenchConfig & {
  /** File the configuration came from, if any */
  configPath: string | undefined;
};

export class ConfigLoader {
  static loadYaml(filePath: string): unknown {
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      return yaml.load(content) ?? {};
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  static load(options: ConfigOptions = {}): LoadedConfig {
    const cwd = options.cwd ?? process.cwd();

    let configPath: string | undefined;
    if (options.configPath) {
      configPath = path.resolve(cwd, options.configPath);
      if (!fs.existsSync(configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
    } else {
      const candidate = path.join(cwd, DEFAULT_CONFIG_FILE);
      configPath = fs.existsSync(candidate) ? candidate : undefined;
    }

    const raw = configPath ? this.loadYaml(configPath) : {};
    const result = BenchConfigSchema.safeParse(raw);

    if (!result.success) {
      const issues = formatConfigIssues(result.error);
      throw new ConfigError(`Configuration validation failed:\n${issues}`, {
        details: { configPath },
      });
    }

    const config = result.data;
    const outputDir = options.flags?.outputDir;

    return {
      ...config,
      output: outputDir ? { ...config.output, dir: outputDir } : config.output,
      configPath,
    };
  }
}
