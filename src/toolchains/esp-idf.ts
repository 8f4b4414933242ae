import { join } from 'node:path';
import { isWindowsHost, type HostTriple } from '../core/host-triple.js';
import { getFrameworksPath, type Layout } from '../core/paths.js';
import { formatTargets, type Target } from '../core/targets.js';
import { gitRefLabel, parseGitRef } from '../core/versions.js';
import type { EspIdfComponent } from '../types/toolchain.js';
import { info, warn } from '../ui/output.js';
import { exportVar, removeDirOrFail, type ToolchainContext } from './helpers.js';

export const ESP_IDF_REPOSITORY = 'https://github.com/espressif/esp-idf.git';

export function espIdfPath(version: string, layout: Layout): string {
  return join(getFrameworksPath(layout), `esp-idf-${gitRefLabel(parseGitRef(version))}`);
}

export function createEspIdf(
  version: string,
  targets: Iterable<Target>,
  hostTriple: HostTriple,
  layout: Layout,
): EspIdfComponent {
  return {
    kind: 'esp-idf',
    version,
    gitRef: parseGitRef(version),
    targets: [...targets],
    hostTriple,
    path: espIdfPath(version, layout),
  };
}

export async function installEspIdf(idf: EspIdfComponent, { toolbox, layout }: ToolchainContext): Promise<string[]> {
  if (await toolbox.pathExists(idf.path)) {
    warn(`Previous checkout of ESP-IDF exists in: '${idf.path}'. Reusing this checkout.`);
  } else {
    info(`Checking out ESP-IDF ${idf.gitRef.kind} '${idf.gitRef.name}'`);
    await toolbox.clone(ESP_IDF_REPOSITORY, idf.path, idf.gitRef);
  }

  info('Installing ESP-IDF tools');
  const env = { IDF_TOOLS_PATH: layout.toolsRoot };
  const targets = formatTargets(idf.targets);
  if (isWindowsHost(idf.hostTriple)) {
    await toolbox.run('cmd', ['/c', join(idf.path, 'install.bat'), targets], { cwd: idf.path, env });
  } else {
    await toolbox.run('bash', [join(idf.path, 'install.sh'), targets], { cwd: idf.path, env });
  }

  return [
    exportVar(idf.hostTriple, 'IDF_TOOLS_PATH', layout.toolsRoot),
    exportVar(idf.hostTriple, 'IDF_PATH', idf.path),
  ];
}

export async function uninstallEspIdf(version: string, { toolbox, layout }: ToolchainContext): Promise<void> {
  info(`Deleting ESP-IDF ${version}`);
  await removeDirOrFail(toolbox, espIdfPath(version, layout));
}
