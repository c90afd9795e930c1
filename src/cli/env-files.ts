import dotenv from 'dotenv';
import path from 'path';

export const ENV_FILES = ['.env.local', '.env'] as const;

/**
 * Load `.env.local`, then `.env`, from a directory (the working directory by
 * default). Values already set win over either file.
 */
export function loadEnvFiles(dir: string = process.cwd(), target: NodeJS.ProcessEnv = process.env): void {
  for (const file of ENV_FILES) {
    dotenv.config({ path: path.join(dir, file), processEnv: target });
  }
}
