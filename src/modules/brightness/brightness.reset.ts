/**
 * Reset every backlight device to full brightness.
 */

import { errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import { DEFAULT_BACKLIGHT_ROOT, listBacklightDevices, SysfsBacklightDriver } from './brightness.drivers.js';

export interface ResetResult {
  reset: string[];
  failed: Array<{ device: string; error: string }>;
}

export async function resetBrightness(logger: Logger, root: string = DEFAULT_BACKLIGHT_ROOT): Promise<ResetResult> {
  const devices = await listBacklightDevices(root);
  const result: ResetResult = { reset: [], failed: [] };

  for (const device of devices) {
    const driver = new SysfsBacklightDriver({ root, device, logger });
    try {
      await driver.setBrightness(100);
      result.reset.push(device);
    } catch (err) {
      result.failed.push({ device, error: errorMessage(err) });
      logger.error({ device, error: errorMessage(err) }, 'Brightness reset failed');
    }
  }

  logger.info({ devices: result.reset.length }, `Screen brightness reset to 100% for ${result.reset.length} device(s)`);
  return result;
}
