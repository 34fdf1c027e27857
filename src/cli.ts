#!/usr/bin/env node
// Ne pas retirer : c'est une directive pour Node.js
// Permet d'exécuter ce fichier sans préciser "node" dans le terminal.

import { Command, Option } from 'commander';
import { globalOptions, runCommand } from './commands/runner.js';
import { authorizeCommand } from './commands/authorize.js';
import { listAccountsCommand } from './commands/list-accounts.js';
import { createAccountsCommand, parseAmount } from './commands/create-accounts.js';
import { listTeamDrivesCommand } from './commands/list-teamdrives.js';
import { createTeamDriveCommand } from './commands/create-teamdrive.js';
import { setTeamDriveUsersCommand } from './commands/set-teamdrive-users.js';
import {
  DEFAULT_CONFIG_FILE,
  DEFAULT_LOG_FILE,
  DEFAULT_TOKEN_FILE,
  ENV_PREFIX,
} from './config/cli-config.js';

// -v, -vv… : chaque occurrence augmente la verbosité
function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

const program = new Command();

program
  .name('sa-maker')
  .description('🔑 CLI pour créer des service accounts Google Cloud en masse et les partager sur des team drives.')
  .version('0.0.1', '--version', 'Affiche la version actuelle du CLI')
  .option('-v, --verbose', 'Augmente le niveau de log (-v : DEBUG, -vv : TRACE)', increaseVerbosity, 0)
  .addOption(
    new Option('--config-path <path>', 'Fichier de configuration')
      .env(`${ENV_PREFIX}_CONFIG_PATH`)
      .default(DEFAULT_CONFIG_FILE),
  )
  .addOption(
    new Option('--log-path <path>', 'Fichier de log')
      .env(`${ENV_PREFIX}_LOG_PATH`)
      .default(DEFAULT_LOG_FILE),
  )
  .addOption(
    new Option('--token-path <path>', 'Fichier du token OAuth2')
      .env(`${ENV_PREFIX}_TOKEN_PATH`)
      .default(DEFAULT_TOKEN_FILE),
  );

// Commande "authorize"
program
  .command('authorize')
  .description('🔐 Autorise le CLI à utiliser votre compte Google.')
  .option('--open', 'Ouvre le lien d’autorisation dans le navigateur')
  .action((options: { open?: boolean }, command: Command) =>
    runCommand(globalOptions(command), (ctx) => authorizeCommand(ctx, options)));

// Commande "list-accounts"
program
  .command('list-accounts')
  .description('📋 Liste les service accounts existants du projet.')
  .action((_options: unknown, command: Command) =>
    runCommand(globalOptions(command), listAccountsCommand));

// Commande "create-accounts"
program
  .command('create-accounts')
  .description('✨ Crée des service accounts numérotés et enregistre leurs clés.')
  .requiredOption('-n, --name <prefix>', 'Préfixe des service accounts')
  .option('-a, --amount <n>', 'Nombre de service accounts à créer', parseAmount, 1)
  .action((options: { name: string; amount: number }, command: Command) =>
    runCommand(globalOptions(command), (ctx) => createAccountsCommand(ctx, options)));

// Commande "list-teamdrives"
program
  .command('list-teamdrives')
  .description('📂 Liste les team drives existantes.')
  .action((_options: unknown, command: Command) =>
    runCommand(globalOptions(command), listTeamDrivesCommand));

// Commande "create-teamdrive"
program
  .command('create-teamdrive')
  .description('➕ Crée une team drive.')
  .requiredOption('-n, --name <name>', 'Nom de la nouvelle team drive')
  .action((options: { name: string }, command: Command) =>
    runCommand(globalOptions(command), (ctx) => createTeamDriveCommand(ctx, options)));

// Commande "set-teamdrive-users"
program
  .command('set-teamdrive-users')
  .description('🤝 Partage une team drive avec les service accounts d’un préfixe.')
  .requiredOption('-n, --name <name>', 'Nom de la team drive existante')
  .requiredOption('-k, --key-prefix <prefix>', 'Préfixe des service accounts (sous-dossier des clés)')
  .action((options: { name: string; keyPrefix: string }, command: Command) =>
    runCommand(globalOptions(command), (ctx) => setTeamDriveUsersCommand(ctx, options)));

// Personnalisation du message d'aide général
program.configureHelp({
  sortSubcommands: true,
  subcommandTerm: (cmd) => cmd.name().padEnd(20),
});

program.addHelpText('after', `
Exemples d'utilisation:
  $ sa-maker authorize
  $ sa-maker create-accounts --name svc --amount 100
  $ sa-maker set-teamdrive-users --name "Backups" --key-prefix svc
`);

await program.parseAsync(process.argv);
