export type { ContentStore } from './types.js';
export { MemoryStore, nextVersion } from './memory-store.js';
export type { ContentSnapshot } from './memory-store.js';
export { CONTENT_FILE, loadContentDirectory, readContentDirectory } from './file-store.js';
export type { ContentDirectory } from './file-store.js';
export { validateSnapshot } from './validate.js';
export type { IssueSeverity, ValidationIssue, ValidationReport } from './validate.js';
