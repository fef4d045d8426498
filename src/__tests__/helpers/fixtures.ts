import { readFileSync } from 'fs'

// Captured device output under src/__tests__/fixtures
export function fixture(name: string): string {
  return readFileSync(new URL(`../fixtures/${name}`, import.meta.url), 'utf8')
}
