export { nonDuplicatePath, pathExists, withSuffix } from './file-paths.js';
