import type { InstallerOptions, ModpmConfig } from '../../types/index.js';
import { createGitCloner } from '../../utils/git-clone.js';
import { getModpmHome } from '../../utils/home-directory.js';
import { configManager } from '../config.js';
import { defaultPythonExecutable, probeInterpreter } from '../environment.js';
import type { OutputPort } from '../ports/output.js';
import { createRegistryClients } from '../registry/registry-client.js';
import { resolveInstallLocation, type LocationFlags } from './install-location.js';
import { Installer } from './installer.js';

export interface CreateInstallerOptions extends Omit<InstallerOptions, 'location'> {
  cwd: string;
  location: LocationFlags;
  output: OutputPort;
  /** Defaults to the user configuration with environment overrides */
  config?: ModpmConfig;
}

/**
 * Build an Installer from the user configuration: probe the configured
 * interpreter, resolve the location flags against it and connect the
 * configured registries.
 */
export async function createInstaller(options: CreateInstallerOptions): Promise<Installer> {
  const { cwd, location: flags, output, config: givenConfig, ...installerOptions } = options;
  const config = givenConfig ?? (await configManager.resolve());

  const interpreter = await probeInterpreter(config.python?.executable ?? defaultPythonExecutable());
  const location = resolveInstallLocation(flags, interpreter, output);

  return new Installer(
    {
      interpreter,
      cwd,
      output,
      modpmHome: getModpmHome(),
      registries: createRegistryClients(config.registries ?? []),
      runtimeCommand: config.runtime?.command,
      gitClone: createGitCloner(config.git?.executable)
    },
    { ...installerOptions, location }
  );
}
