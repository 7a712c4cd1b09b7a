import { CommandRegistry } from './registry.js';
import {
  adminHelpCommand,
  clearCommand,
  exportDataCommand,
  setChannelCommand,
  setLedgerTypeCommand,
  setRoleCommand,
  showConfigCommand,
} from './admin.js';
import { checkCommand, helpCommand } from './public.js';

export function buildCommandRegistry() {
  const registry = new CommandRegistry();
  registry.register(setChannelCommand());
  registry.register(setRoleCommand());
  registry.register(setLedgerTypeCommand());
  registry.register(exportDataCommand());
  registry.register(showConfigCommand());
  registry.register(clearCommand());
  registry.register(adminHelpCommand());
  registry.register(helpCommand());
  registry.register(checkCommand());
  return registry;
}

export type { CommandRegistry };
