/**
 * Cache Refresh Command
 *
 * Downloads a fresh series and stores it, regardless of the cache's age.
 *
 * @module packages/cli/commands/cache/refresh
 */

import type { Logger } from '../../logger.js';
import type { DataService } from '../../services/dataService.js';

export async function refreshCommand(service: DataService, logger: Logger): Promise<void> {
  const result = await service.refresh();
  logger.info({ count: result.points.length, createdAt: result.createdAt }, 'Cache refreshed');
}
