export const APP_NAME = 'espforge';
export const DESCRIPTION = 'Installs and removes the Rust and C toolchains for Espressif chips';
export const HOME_DIR = '.espforge';
export const ENV_PREFIX = 'ESPFORGE';
export const NPM_PACKAGE = 'espforge';

export function envVar(suffix: string): string {
  return `${ENV_PREFIX}_${suffix.toUpperCase()}`;
}
