import { spawn } from 'node:child_process'
import fs from 'node:fs/promises'
import { CompileError } from '@netrules/core'
import type { CompileJob, RuleSetCompiler } from '@netrules/core'

export interface ExecResult {
  code: number | null
  stderr: string
}

export type ExecFn = (
  bin: string,
  args: readonly string[],
  opts: { signal?: AbortSignal; timeoutMs: number },
) => Promise<ExecResult>

export interface SingBoxCompilerOptions {
  /** sing-box executable, default `sing-box` from PATH */
  bin?: string
  timeoutMs?: number
  exec?: ExecFn
}

export const DEFAULT_COMPILE_TIMEOUT_MS = 60_000

/** spawn without a shell; stderr is kept for the error message */
export const spawnExec: ExecFn = (bin, args, opts) =>
  new Promise<ExecResult>((resolve, reject) => {
    const child = spawn(bin, args, {
      stdio: ['ignore', 'ignore', 'pipe'],
      shell: false,
      signal: opts.signal,
      timeout: opts.timeoutMs,
    })
    let stderr = ''
    child.stderr?.setEncoding('utf8')
    child.stderr?.on('data', (chunk: string) => {
      stderr += chunk
    })
    child.on('error', (error) => reject(error))
    child.on('close', (code) => resolve({ code, stderr }))
  })

export function compileArgs(input: string, output: string): string[] {
  return ['rule-set', 'compile', '--output', output, input]
}

async function nonEmptyFile(file: string): Promise<boolean> {
  try {
    const st = await fs.stat(file)
    return st.isFile() && st.size > 0
  } catch {
    return false
  }
}

/** `sing-box rule-set compile` behind the RuleSetCompiler contract */
export function singBoxCompiler(options: SingBoxCompilerOptions = {}): RuleSetCompiler {
  const bin = options.bin ?? 'sing-box'
  const timeoutMs = options.timeoutMs ?? DEFAULT_COMPILE_TIMEOUT_MS
  const exec = options.exec ?? spawnExec

  return {
    async compile(job: CompileJob) {
      let res: ExecResult
      try {
        res = await exec(bin, compileArgs(job.input, job.output), { signal: job.signal, timeoutMs })
      } catch (e) {
        throw new CompileError(job.group, `cannot run ${bin}: ${e instanceof Error ? e.message : String(e)}`, { cause: e })
      }

      if (res.code !== 0) {
        const detail = res.stderr.trim().split('\n').slice(-3).join(' | ')
        throw new CompileError(job.group, `${bin} exited with code ${res.code ?? 'null'}${detail ? `: ${detail}` : ''}`)
      }
      if (!(await nonEmptyFile(job.output))) {
        throw new CompileError(job.group, `${bin} produced no output at ${job.output}`)
      }
    },
  }
}

export default singBoxCompiler
