/**
 * Packaging tests.
 *
 * Compiled code must never resolve a workspace import to a .ts source:
 * every package's run-time export and the `keyline` bin point into the
 * dist/ directory its own tsconfig.json emits to.
 */

import { describe, it, expect } from 'vitest'
import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'

function readJson(relative: string): unknown {
  const path = fileURLToPath(new URL(`../../../${relative}`, import.meta.url))
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'))
  return parsed
}

describe('workspace packaging', () => {
  it.each(['config-lang', 'runtime-host'])('%s exports compiled JavaScript at run time', (pkg) => {
    expect(readJson(`packages/${pkg}/package.json`)).toMatchObject({
      types: './src/index.ts',
      exports: {
        '.': {
          types:   './src/index.ts',
          import:  './dist/index.js',
          default: './dist/index.js',
        },
      },
    })
  })

  it.each(['config-lang', 'runtime-host', 'cli'])('%s emits src/ into dist/', (pkg) => {
    expect(readJson(`packages/${pkg}/tsconfig.json`)).toMatchObject({
      compilerOptions: { composite: true, rootDir: 'src', outDir: 'dist' },
    })
  })

  it('points the keyline bin at the compiled entry point', () => {
    expect(readJson('packages/cli/package.json')).toMatchObject({
      bin: { keyline: './dist/bin/keyline.js' },
    })
    expect(readJson('package.json')).toMatchObject({
      bin: { keyline: './packages/cli/dist/bin/keyline.js' },
      scripts: { build: 'tsc -b packages/cli' },
    })
  })
})
