import { spawn } from 'node:child_process'

export interface RunArgs { readonly cmd: string; readonly cwd?: string; readonly stdin?: string; readonly env?: Readonly<Record<string, string>> }

export interface RunResult { readonly ok: boolean; readonly exitCode: number; readonly stdout: string; readonly stderr: string }

interface ProcUtil {
  readonly run: (args: RunArgs) => Promise<RunResult>
  readonly has: (cmd: string) => Promise<boolean>
}

/**
 * Quote a single argument for the platform shell. Plain words pass through.
 */
export function quoteArg(arg: string): string {
  if (/^[A-Za-z0-9_./:=@%+,-]+$/.test(arg)) return arg
  if (process.platform === 'win32') return `"${arg.replace(/"/g, '""')}"`
  return `'${arg.replace(/'/g, `'\\''`)}'`
}

async function run(args: RunArgs): Promise<RunResult> {
  return await new Promise<RunResult>((resolve) => {
    if (args.cmd.trim().length === 0) return resolve({ ok: false, exitCode: 1, stdout: '', stderr: 'empty command' })
    const isWin: boolean = process.platform === 'win32'
    const shellFile: string = isWin ? (process.env.ComSpec ?? 'cmd.exe') : '/bin/sh'
    const shellArgs: readonly string[] = isWin ? ['/d', '/s', '/c', args.cmd] : ['-c', args.cmd]
    const mergedEnv: NodeJS.ProcessEnv = args.env !== undefined ? { ...process.env, ...args.env } : process.env
    const cp = spawn(shellFile, [...shellArgs], { cwd: args.cwd, windowsHide: true, env: mergedEnv })
    const outChunks: Buffer[] = []
    const errChunks: Buffer[] = []
    cp.stdout?.on('data', (d: Buffer) => { outChunks.push(Buffer.from(d)) })
    cp.stderr?.on('data', (d: Buffer) => { errChunks.push(Buffer.from(d)) })
    if (typeof args.stdin === 'string' && cp.stdin) {
      cp.stdin.write(args.stdin)
      cp.stdin.end()
    }
    cp.on('error', (err: Error) => {
      resolve({ ok: false, exitCode: 1, stdout: Buffer.concat(outChunks).toString(), stderr: Buffer.concat(errChunks).toString() || err.message })
    })
    cp.on('close', (code: number | null) => {
      const exit: number = code === null ? 1 : code
      resolve({ ok: exit === 0, exitCode: exit, stdout: Buffer.concat(outChunks).toString(), stderr: Buffer.concat(errChunks).toString() })
    })
  })
}

async function has(cmd: string): Promise<boolean> {
  const res: RunResult = await proc.run({ cmd: `${cmd} --version` })
  return res.ok
}

export const proc: ProcUtil = { run, has }
