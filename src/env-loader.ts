import { existsSync } from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';

/**
 * Find the project root directory by searching upward for a .git directory
 * @param startDir - Directory to start searching from
 * @returns Path to project root, or null if not found
 */
export function findProjectRoot(startDir: string): string | null {
  let current = path.resolve(startDir);
  const root = path.parse(current).root;

  while (current !== root) {
    if (existsSync(path.join(current, '.git'))) {
      return current;
    }
    current = path.dirname(current);
  }

  return null;
}

/**
 * Load .env files in cascading order (local overrides global)
 * Priority: process.env > content/.env > project root/.env
 *
 * dotenv never overwrites a variable that is already set, so loading the
 * most local file first lets it win over the project root.
 *
 * @param contentDir - Content directory path
 * @param cwd - Current working directory (for project root search)
 * @returns Array of successfully loaded .env file paths
 */
export function loadEnvFiles(contentDir: string, cwd: string): string[] {
  const loadedFiles: string[] = [];
  const envFilePaths: string[] = [path.join(contentDir, '.env')];

  const projectRoot = findProjectRoot(cwd);
  if (projectRoot) {
    const rootEnv = path.join(projectRoot, '.env');
    if (!envFilePaths.includes(rootEnv)) {
      envFilePaths.push(rootEnv);
    }
  }

  for (const envPath of envFilePaths) {
    if (!existsSync(envPath)) continue;

    const result = dotenv.config({ path: envPath, override: false });
    if (result.error) {
      console.error(`[WARN] Failed to load ${envPath}: ${result.error.message}`);
      continue;
    }
    loadedFiles.push(envPath);
  }

  return loadedFiles;
}
