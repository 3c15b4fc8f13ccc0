import { fileURLToPath } from 'node:url';

export function resolvePath(metaUrl: string, relativePath: string): string {
  return fileURLToPath(new URL(relativePath, metaUrl));
}
