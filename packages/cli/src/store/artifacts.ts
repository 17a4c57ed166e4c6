import { existsSync } from 'node:fs'
import fs from 'node:fs/promises'
import path from 'node:path'
import { EmissionError, describeError } from '@netrules/core'
import type { ArtifactStore, RenderedArtifacts, StagedArtifacts } from '@netrules/core'

export function artifactPaths(outDir: string, group: string) {
  const dir = path.join(outDir, group)
  return {
    dir,
    list: path.join(dir, `${group}.list`),
    structured: path.join(dir, `${group}.json`),
    compiled: path.join(dir, `${group}.srs`),
  }
}

async function isFile(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile()
  } catch {
    return false
  }
}

async function restore(prevDir: string, backedUp: string[], placed: string[]): Promise<void> {
  for (const target of placed) {
    if (!backedUp.includes(target)) await fs.rm(target, { force: true })
  }
  for (const target of backedUp) {
    await fs.rename(path.join(prevDir, path.basename(target)), target)
  }
}

/**
 * out/<group>/<group>.{list,json,srs}
 * Новые файлы сначала пишутся в out/<group>/.staging-*, затем заменяют старые целиком:
 * .srs без нового скомпилированного файла удаляется.
 */
export function createFileArtifactStore(outDir: string): ArtifactStore {
  return {
    async exists(group, opts = {}) {
      const p = artifactPaths(outDir, group)
      const checks = [p.list, p.structured, ...(opts.compiled ? [p.compiled] : [])]
      const present = await Promise.all(checks.map(isFile))
      return present.every(Boolean)
    },

    async stage(group: string, rendered: RenderedArtifacts): Promise<StagedArtifacts> {
      const paths = artifactPaths(outDir, group)
      const stagingDir = path.join(paths.dir, `.staging-${process.pid}-${Date.now()}`)
      const staged = {
        list: path.join(stagingDir, path.basename(paths.list)),
        structured: path.join(stagingDir, path.basename(paths.structured)),
        compiled: path.join(stagingDir, path.basename(paths.compiled)),
      }

      const discard = async () => {
        await fs.rm(stagingDir, { recursive: true, force: true })
      }

      try {
        await fs.mkdir(stagingDir, { recursive: true })
        await fs.writeFile(staged.list, rendered.list, 'utf8')
        await fs.writeFile(staged.structured, rendered.structured, 'utf8')
      } catch (e) {
        if (existsSync(stagingDir)) await discard()
        throw new EmissionError(group, `cannot write ${stagingDir}: ${describeError(e)}`, { cause: e })
      }

      return {
        paths: { list: paths.list, structured: paths.structured, compiled: paths.compiled },
        staging: { structured: staged.structured, compiled: staged.compiled },
        async commit() {
          // текущие файлы уходят в staging/prev и возвращаются, если замена сорвалась
          const prevDir = path.join(stagingDir, 'prev')
          const moves = [
            { from: staged.list, to: paths.list },
            { from: staged.structured, to: paths.structured },
            ...((await isFile(staged.compiled)) ? [{ from: staged.compiled, to: paths.compiled }] : []),
          ]
          const targets = [paths.list, paths.structured, paths.compiled]
          const backedUp: string[] = []
          const placed: string[] = []
          try {
            await fs.mkdir(prevDir)
            for (const target of targets) {
              if (!(await isFile(target))) continue
              await fs.rename(target, path.join(prevDir, path.basename(target)))
              backedUp.push(target)
            }
            for (const move of moves) {
              await fs.rename(move.from, move.to)
              placed.push(move.to)
            }
          } catch (e) {
            await restore(prevDir, backedUp, placed)
            throw new EmissionError(group, `cannot replace artifacts in ${paths.dir}: ${describeError(e)}`, { cause: e })
          } finally {
            await discard()
          }
        },
        discard,
      }
    },
  }
}
