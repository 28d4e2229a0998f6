import { UnsupportedManagerError } from '../errors';
import { ManagerHandler, ManagerKind } from '../types';
import npmHandler from './npm';
import pipHandler from './pip';
import poetryHandler from './poetry';

export const MANAGER_HANDLERS: Record<ManagerKind, ManagerHandler> = {
  pip: pipHandler,
  npm: npmHandler,
  poetry: poetryHandler,
};

export function isManagerKind(value: string): value is ManagerKind {
  return Object.prototype.hasOwnProperty.call(MANAGER_HANDLERS, value);
}

export function getHandler(kind: string): ManagerHandler {
  if (!isManagerKind(kind)) {
    throw new UnsupportedManagerError(
      `Unsupported package manager '${kind}' (supported: ${Object.keys(MANAGER_HANDLERS).join(', ')})`,
    );
  }
  return MANAGER_HANDLERS[kind];
}

/** Picks the handler for a command line by its first token. */
export function getManagerHandler(command: string[]): ManagerHandler {
  if (command.length === 0) {
    throw new UnsupportedManagerError('Missing package manager command');
  }
  return getHandler(command[0]);
}

export { npmHandler, pipHandler, poetryHandler };
