// Environment loading for the CLI entry points
import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';

// Variables already set win; .env.local is loaded first so it beats .env
const ENV_FILES = ['.env.local', '.env'];

export function loadEnvironment(baseDir: string = process.cwd()): string[] {
  const loaded: string[] = [];
  ENV_FILES.forEach(envFile => {
    const envPath = path.resolve(baseDir, envFile);
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath });
      loaded.push(envFile);
    }
  });
  return loaded;
}
