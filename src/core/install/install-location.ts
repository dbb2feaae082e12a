import type { InstallLocation, InterpreterInfo } from '../../types/index.js';
import { ValidationError } from '../../utils/errors.js';
import type { OutputPort } from '../ports/output.js';

export interface LocationFlags {
  global?: boolean;
  root?: boolean;
}

/**
 * Pick the install location from the command-line flags.
 *
 * `--global` inside a virtual environment becomes `root`: a per-user tree
 * would not be visible to the environment's interpreter.
 */
export function resolveInstallLocation(
  flags: LocationFlags,
  interpreter: Pick<InterpreterInfo, 'inVirtualEnv'>,
  output: OutputPort
): InstallLocation {
  if (flags.global && flags.root) {
    throw new ValidationError('-g,--global and --root can not be used together');
  }
  if (flags.global) {
    if (interpreter.inVirtualEnv) {
      output.info('Note: detected virtual environment, upgrading -g,--global to --root');
      return 'root';
    }
    return 'global';
  }
  return flags.root ? 'root' : 'local';
}
