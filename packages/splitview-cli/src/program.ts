/**
 * splitview command-line program
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { ConfigManager, ConfigurationError, Logger } from 'splitview-core';
import type { ViewerConfig } from 'splitview-core';
import pkg from '../package.json';
import { executeCLICommand, setDebugMode } from './cli-wrapper';

export interface ViewOptions {
  config?: string;
  debug?: boolean;
  log: boolean;
}

export interface ConfigCommandOptions {
  config?: string;
  show?: boolean;
  path?: boolean;
  get?: string;
}

export interface ProgramDeps {
  startTUI: (options: { config: ViewerConfig; logger: Logger }) => Promise<void>;
  print: (line: string) => void;
}

const defaultDeps: ProgramDeps = {
  startTUI: async (options) => {
    const { startTUI } = await import('splitview-tui');
    await startTUI(options);
  },
  print: (line) => console.log(line)
};

function isConfigKey(key: string): key is keyof ViewerConfig {
  return Object.hasOwn(ConfigManager.getDefaultConfig(), key);
}

/**
 * Apply command-line flags over the loaded config
 */
export function applyViewOptions(config: ViewerConfig, root: string | undefined, options: ViewOptions): ViewerConfig {
  const logging = { ...config.logging };
  if (options.debug) {
    logging.level = 'debug';
  }
  if (!options.log) {
    logging.enabled = false;
  }

  return {
    ...config,
    rootPath: root ?? config.rootPath,
    logging
  };
}

export function createLogger(config: ViewerConfig): Logger {
  if (!config.logging.enabled) {
    return Logger.disabled();
  }
  return new Logger({
    name: 'splitview',
    level: config.logging.level,
    filePath: resolve(config.logging.filePath)
  });
}

export function createProgram(deps: ProgramDeps = defaultDeps): Command {
  const program = new Command();

  program
    .name('splitview')
    .description('Browse a directory in a split terminal view: menu on the left, content on the right')
    .version(pkg.version)
    // Lets `config` take its own --config
    .enablePositionalOptions()
    .argument('[root]', 'Directory to browse (defaults to the configured root)')
    .option('-c, --config <path>', 'Configuration file to use')
    .option('-d, --debug', 'Show debug details on errors and log at debug level')
    .option('--no-log', 'Disable the debug log file')
    .action(async (root: string | undefined, options: ViewOptions) => {
      setDebugMode(options.debug ?? false);

      await executeCLICommand(
        'view',
        async () => {
          const config = applyViewOptions(await ConfigManager.load(options.config), root, options);
          const logger = createLogger(config);
          logger.info(`splitview ${pkg.version} starting`);

          try {
            await deps.startTUI({ config, logger });
          } finally {
            await logger.close();
          }
        },
        { operation: 'start viewer', filePath: root }
      );
    });

  program
    .command('config')
    .description('Show configuration settings')
    .option('-c, --config <path>', 'Configuration file to use')
    .option('--show', 'Show current configuration')
    .option('--path', 'Show the configuration file location')
    .option('-g, --get <key>', 'Get a configuration value')
    .action(async (options: ConfigCommandOptions) => {
      await executeCLICommand(
        'config',
        async () => {
          const configPath = options.config ?? ConfigManager.getConfigPath();

          if (options.path) {
            deps.print(configPath);
          } else if (options.get) {
            if (!isConfigKey(options.get)) {
              throw new ConfigurationError(`Invalid configuration key: ${options.get}`);
            }
            const value = await ConfigManager.get(options.get, configPath);
            deps.print(`${options.get}: ${JSON.stringify(value)}`);
          } else {
            const config = await ConfigManager.load(configPath);
            deps.print(JSON.stringify(config, null, 2));
          }
        },
        { operation: 'read configuration', filePath: options.config }
      );
    });

  return program;
}
