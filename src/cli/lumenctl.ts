#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import dotenv from 'dotenv';
import { loadConfig, readConfigFile, resolveConfigPath, validateConfig } from '../core/config/LightConfig';
import { ConfigurationError } from '../core/errors/LightError';
import { LightManager } from '../core/LightManager';
import { LedMode } from '../core/types/LightTypes';
import { ModelCatalog } from '../devices/models/ModelCatalog';
import { decodeFrame, encodeFrame, formatFrame } from '../devices/protocol/FrameCodec';
import { BleTransport } from '../devices/transport/BleTransport';
import { NobleTransport } from '../devices/transport/NobleTransport';
import { SimulatedTransport } from '../testing/SimulatedTransport';
import { Logger } from '../utils/Logger';
import { SetOptions, buildIntent, parseByte, parseInteger, parseRgb } from './options';

dotenv.config();

const program = new Command();

program
  .name('lumenctl')
  .description('Control BLE light fixtures')
  .version('0.1.0')
  .option('-c, --config <path>', 'configuration file')
  .option('-d, --debug', 'print stack traces on failure', false);

function fail(error: unknown): never {
  if (error instanceof ConfigurationError) {
    console.error(chalk.red(error.message));
    error.issues.forEach(issue => console.error(chalk.red(`  - ${issue}`)));
  } else {
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  }
  if (program.opts().debug) {
    console.error(error);
  }
  process.exit(1);
}

/**
 * List models
 */
program
  .command('models')
  .description('Print the model catalog')
  .option('--models <path>', 'model table merged over the built-in one')
  .action(async (options: { models?: string }) => {
    try {
      const catalog = await ModelCatalog.load(options.models);
      console.log(chalk.bold('\nModels:'));
      console.log('=======\n');
      catalog.list().forEach(profile => {
        console.log(chalk.bold(profile.model));
        console.log(`  Layout: ${LedMode[profile.ledMode]}`);
        console.log(`  Brightness: 0-${profile.brightnessMax}`);
        console.log(`  Temperature: ${profile.minKelvin}-${profile.maxKelvin} K (${profile.temperatureEncoding})`);
      });
    } catch (error) {
      fail(error);
    }
  });

/**
 * Encode a frame
 */
program
  .command('frame')
  .description('Encode a control frame')
  .argument('<command>', 'command byte, decimal or 0x-prefixed', parseInteger)
  .argument('[bytes...]', 'payload bytes')
  .action((command: number, bytes: string[]) => {
    try {
      const frame = encodeFrame(command, bytes.map(parseByte));
      const decoded = decodeFrame(frame);
      console.log(formatFrame(frame));
      console.log(chalk.gray(`command 0x${decoded.command.toString(16).padStart(2, '0')}, checksum 0x${frame[19].toString(16).padStart(2, '0')}`));
    } catch (error) {
      fail(error);
    }
  });

const configCommand = program
  .command('config')
  .description('Configuration tools');

configCommand
  .command('check')
  .description('Validate a configuration file')
  .argument('[path]', 'configuration file')
  .action(async (path?: string) => {
    const source = resolveConfigPath(path ?? program.opts().config);
    if (!source) {
      console.log(chalk.yellow('No configuration file found; defaults apply'));
      return;
    }

    try {
      const result = validateConfig(await readConfigFile(source));
      if (!result.valid) {
        console.error(chalk.red(`✗ ${source} is invalid:`));
        result.issues.forEach(issue => console.error(chalk.red(`  - ${issue}`)));
        process.exit(1);
      }
      const config = await loadConfig(source);
      console.log(chalk.green(`✓ ${source} is valid`));
      console.log(`  Devices: ${config.devices.length}`);
      console.log(`  Parallel updates: ${config.scheduler.parallelism}`);
      console.log(`  Connection slots: ${config.scheduler.slotCapacity}`);
    } catch (error) {
      fail(error);
    }
  });

/**
 * Drive one light
 */
program
  .command('set')
  .description('Set the state of one light and wait until it is sent')
  .argument('<address>', 'device MAC address')
  .option('--model <model>', 'model number, when the device is not in the configuration')
  .option('--on', 'turn on')
  .option('--off', 'turn off')
  .option('--brightness <n>', 'brightness 0-255', parseByte)
  .option('--rgb <r,g,b>', 'RGB color', parseRgb)
  .option('--kelvin <k>', 'color temperature', parseInteger)
  .option('--dry-run', 'use the simulated transport and print the frames')
  .action(async (address: string, options: SetOptions) => {
    let manager: LightManager | undefined;
    const spinner = ora(`Updating ${address}...`);

    try {
      const intent = buildIntent(options);
      const loaded = await loadConfig(program.opts().config);
      Logger.configure(loaded.logging);

      // One-shot: close the link as soon as the intent is on the wire
      const config = {
        ...loaded,
        device: { ...loaded.device, keepAliveTicks: 0 },
        devices: []
      };
      const known = loaded.devices.find(device => device.address === address.toUpperCase());
      const simulated = options.dryRun ? new SimulatedTransport() : undefined;
      const transport: BleTransport = simulated ?? new NobleTransport(config.transport);

      manager = await LightManager.fromConfig(config, transport);
      const device = manager.addDevice(known ?? { address, model: options.model ?? 'default' });

      spinner.start();
      device.setIntent(intent);
      await manager.whenIdle();

      const snapshot = device.snapshot();
      if (!snapshot.available) {
        spinner.fail(`${device.name} is unavailable (${snapshot.connectionStatus})`);
        process.exitCode = 1;
      } else {
        spinner.succeed(`${device.name} updated`);
      }

      if (simulated) {
        console.log(chalk.bold('\nFrames:'));
        simulated.getFrames(device.address).forEach(frame => console.log(formatFrame(frame.raw)));
      }
    } catch (error) {
      spinner.stop();
      await manager?.shutdown();
      fail(error);
    }

    await manager?.shutdown();
    if (!options.dryRun) {
      // noble keeps the HCI socket open
      process.exit();
    }
  });

program.parseAsync(process.argv).catch(fail);
