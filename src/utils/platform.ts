export const isWindows = process.platform === 'win32';

export function exeSuffix(windows: boolean = isWindows): string {
  return windows ? '.exe' : '';
}

export function toWindowsSeparators(value: string): string {
  return value.replace(/\//g, '\\');
}
