export { registerCreate } from './create.js';
export { registerAdd } from './add.js';
export { registerProfiles } from './profiles.js';
export { registerComponents } from './components.js';
export { registerConfig } from './config.js';
export { registerDoctor } from './doctor.js';
export { registerVersion } from './version.js';
