export { registerCompletions } from './completions.js';
export { registerConfig } from './config.js';
export { registerInstall } from './install.js';
export { registerStatus } from './status.js';
export { registerUninstall } from './uninstall.js';
export { registerUpdate } from './update.js';
export { registerVersion } from './version.js';
