/**
 * CLI commands index
 * Exports all command creators
 */

export { createClassifyCommand, createTargetsCommand } from './classify.js';
export { createBuildCommand, createRenameCommand } from './build.js';
export { createAssembleCommand } from './assemble.js';
export { createReleaseCommand } from './release.js';
export { createGateCommand } from './gate.js';
export { createFetchModelCommand } from './fetch-model.js';
export { createConfigCommand } from './config.js';
