/**
 * @module commands/create-teamdrive
 * Implémente la commande `sa-maker create-teamdrive --name <nom>`.
 */

import type { CommandContext } from './runner.js';
import { TeamDriveService } from '../services/teamdrive-service.js';

export async function createTeamDriveCommand(ctx: CommandContext, options: { name: string }): Promise<void> {
  const drive = await new TeamDriveService(ctx.api, ctx.logger).createTeamDrive(options.name);
  ctx.logger.success(`Team drive "${drive.name}" créée (id : ${drive.id})`);
}
