/**
 * @module commands/list-teamdrives
 * Implémente la commande `sa-maker list-teamdrives`.
 */

import type { CommandContext } from './runner.js';
import { TeamDriveService } from '../services/teamdrive-service.js';

export async function listTeamDrivesCommand(ctx: CommandContext): Promise<void> {
  const drives = await new TeamDriveService(ctx.api, ctx.logger).listTeamDrives();
  ctx.logger.info(`Team drives existantes (${drives.length}) :\n${JSON.stringify(drives, null, 2)}`);
}
