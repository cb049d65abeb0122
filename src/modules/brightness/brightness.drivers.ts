/**
 * Brightness drivers
 *
 * - sysfs: Linux backlight class devices (/sys/class/backlight/<device>)
 * - dry-run: in-memory level, writes are only logged
 */

import { readdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { clamp } from '../../common/math.js';
import type { Logger } from '../../common/logger.js';
import type { BrightnessDriver } from './brightness.types.js';

export const DEFAULT_BACKLIGHT_ROOT = '/sys/class/backlight';

async function readInteger(file: string): Promise<number> {
  const raw = (await readFile(file, 'utf8')).trim();
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value)) {
    throw new Error(`Unexpected content in ${file}: "${raw}"`);
  }
  return value;
}

const isNotFound = (err: unknown): boolean =>
  err instanceof Error && 'code' in err && err.code === 'ENOENT';

export async function listBacklightDevices(root: string = DEFAULT_BACKLIGHT_ROOT): Promise<string[]> {
  try {
    const entries = await readdir(root);
    return entries.sort();
  } catch (err) {
    if (isNotFound(err)) {
      return [];
    }
    throw err;
  }
}

export interface SysfsDriverOptions {
  root?: string;
  device?: string;
  logger: Logger;
}

export class SysfsBacklightDriver implements BrightnessDriver {
  readonly name = 'sysfs';
  private readonly root: string;
  private device: string | null;
  private readonly logger: Logger;

  constructor(options: SysfsDriverOptions) {
    this.root = options.root ?? DEFAULT_BACKLIGHT_ROOT;
    this.device = options.device ?? null;
    this.logger = options.logger;
  }

  async getBrightness(): Promise<number | null> {
    const dir = await this.deviceDir();
    const [raw, max] = await Promise.all([
      readInteger(path.join(dir, 'brightness')),
      readInteger(path.join(dir, 'max_brightness')),
    ]);
    if (max <= 0) {
      return null;
    }
    return Math.round((raw / max) * 100);
  }

  async setBrightness(percent: number): Promise<void> {
    const dir = await this.deviceDir();
    const max = await readInteger(path.join(dir, 'max_brightness'));
    const raw = Math.round((clamp(percent, 0, 100) / 100) * max);

    await writeFile(path.join(dir, 'brightness'), `${raw}\n`, 'utf8');
    this.logger.debug?.({ device: path.basename(dir), percent, raw, max }, 'Backlight written');
  }

  private async deviceDir(): Promise<string> {
    if (!this.device) {
      const [first] = await listBacklightDevices(this.root);
      if (!first) {
        throw new Error(`No backlight device under ${this.root}`);
      }
      this.device = first;
      this.logger.info({ device: first }, 'Backlight device detected');
    }
    return path.join(this.root, this.device);
  }
}

export class DryRunBrightnessDriver implements BrightnessDriver {
  readonly name = 'dry-run';
  private level: number | null;

  constructor(private readonly logger: Logger, initial: number | null = null) {
    this.level = initial;
  }

  async getBrightness(): Promise<number | null> {
    return this.level;
  }

  async setBrightness(percent: number): Promise<void> {
    this.level = percent;
    this.logger.info({ percent }, 'Dry-run brightness write');
  }
}
