import type { RenderedArtifacts } from '../render/types'
import type { ArtifactStore, StagedArtifacts } from './types'

export interface MemoryArtifactStore extends ArtifactStore {
  /** path → content; staged files carry a `.staged` suffix until committed */
  files: Map<string, string | Uint8Array>
  read(path: string): string | Uint8Array | undefined
}

export function createMemoryArtifactStore(opts: { root?: string } = {}): MemoryArtifactStore {
  const root = opts.root ?? 'out'
  const files = new Map<string, string | Uint8Array>()

  const pathsOf = (group: string) => ({
    list: `${root}/${group}/${group}.list`,
    structured: `${root}/${group}/${group}.json`,
    compiled: `${root}/${group}/${group}.srs`,
  })

  return {
    files,
    read: (p) => files.get(p),

    async exists(group, o = {}) {
      const p = pathsOf(group)
      return files.has(p.list) && files.has(p.structured) && (!o.compiled || files.has(p.compiled))
    },

    async stage(group: string, rendered: RenderedArtifacts): Promise<StagedArtifacts> {
      const paths = pathsOf(group)
      const staged = {
        list: `${paths.list}.staged`,
        structured: `${paths.structured}.staged`,
        compiled: `${paths.compiled}.staged`,
      }
      files.set(staged.list, rendered.list)
      files.set(staged.structured, rendered.structured)

      const move = (from: string, to: string) => {
        const data = files.get(from)
        if (data === undefined) return
        files.set(to, data)
        files.delete(from)
      }

      return {
        paths,
        staging: { structured: staged.structured, compiled: staged.compiled },
        async commit() {
          move(staged.list, paths.list)
          move(staged.structured, paths.structured)
          if (files.has(staged.compiled)) move(staged.compiled, paths.compiled)
          else files.delete(paths.compiled)
        },
        async discard() {
          for (const p of Object.values(staged)) files.delete(p)
        },
      }
    },
  }
}
