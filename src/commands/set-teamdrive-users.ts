/**
 * @module commands/set-teamdrive-users
 * Implémente la commande `sa-maker set-teamdrive-users --name <drive> --key-prefix <préfixe>` :
 * partage une team drive avec tous les service accounts d’un dossier de clés.
 */

import type { CommandContext } from './runner.js';
import { TeamDriveService } from '../services/teamdrive-service.js';

export interface SetTeamDriveUsersOptions {
  name: string;
  keyPrefix: string;
}

export async function setTeamDriveUsersCommand(ctx: CommandContext, options: SetTeamDriveUsersOptions): Promise<void> {
  const { api, config, logger } = ctx;
  const report = await new TeamDriveService(api, logger).shareTeamDrive({
    driveName: options.name,
    keyPrefix: options.keyPrefix,
    folder:    config.serviceAccountFolder,
  });

  logger.success(
    `Team drive "${report.drive.name}" (${report.drive.id}) : ${report.granted.length} accès accordé(s), ` +
    `${report.alreadyShared.length} déjà présent(s).`,
  );
}
