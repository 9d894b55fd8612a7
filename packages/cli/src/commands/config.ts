import { Command } from 'commander';
import { ConfigManager, CONFIG_ENV_VARS, CONFIG_FILE_NAMES } from '@greengate/core';
import { action, printJson, type CommonOptions } from '../setup.js';

export const configCommand = new Command('config')
  .description('Manage GreenGate configuration');

configCommand
  .command('show', { isDefault: true })
  .description('Show the effective configuration')
  .option('-c, --config <path>', 'Config file path')
  .action(action(async (options: CommonOptions) => {
    const mgr = new ConfigManager();
    const config = await mgr.load({ configPath: options.config });
    const source = mgr.getSourcePath();
    const masked = config.carbonApi.apiKey
      ? { ...config, carbonApi: { ...config.carbonApi, apiKey: '***' } }
      : config;
    if (!source) console.error('No config file found; showing defaults and environment.');
    printJson(masked);
  }));

configCommand
  .command('path')
  .description('Show config file search paths')
  .action(() => {
    console.log('Config files searched from the current directory upwards (first found wins):');
    CONFIG_FILE_NAMES.forEach((name, i) => console.log(`  ${i + 1}. ${name}`));
    console.log('');
    console.log('Environment variables:');
    for (const name of CONFIG_ENV_VARS) console.log(`  ${name}`);
  });
