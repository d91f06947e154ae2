import { describe, it, expect, vi, beforeEach } from 'vitest'
import { deployFunctions } from '../commands/deploy'
import { captureConsole, stubCli } from '../../tests/helpers/cli-stub'
import { functionSources, withRepo } from '../../tests/helpers/repo'

const { confirmMock } = vi.hoisted(() => ({
  confirmMock: vi.fn(async (): Promise<boolean | symbol> => true)
}))
vi.mock('@clack/prompts', () => ({
  confirm: confirmMock,
  isCancel: (v: unknown): boolean => typeof v === 'symbol'
}))

const fn = 'sam-json-processor'

describe('production confirmation', () => {
  beforeEach(() => {
    confirmMock.mockReset()
  })

  it('aborts before any tool runs when the user declines', async () => {
    confirmMock.mockResolvedValueOnce(false)
    const { calls } = stubCli()
    const { out } = captureConsole()
    await withRepo(functionSources([fn]), async (dir) => {
      const report = await deployFunctions({ environment: 'prod', unit: fn, cwd: dir, region: 'us-east-1', interactive: true })
      expect(report).toBeNull()
      expect(confirmMock).toHaveBeenCalledTimes(1)
      expect(confirmMock).toHaveBeenCalledWith({ message: 'Deploy 1 function(s) to prod?', initialValue: false })
      expect(out).toContain('⚠ Deployment aborted by user')
      expect(calls).toEqual([])
      expect(process.exitCode).toBe(1)
    })
  })

  it('treats a cancelled prompt as a refusal', async () => {
    confirmMock.mockResolvedValueOnce(Symbol('clack:cancel'))
    const { calls } = stubCli()
    captureConsole()
    await withRepo(functionSources([fn]), async (dir) => {
      const report = await deployFunctions({ environment: 'production', unit: fn, cwd: dir, region: 'us-east-1', interactive: true })
      expect(report).toBeNull()
      expect(calls.some((c) => c.startsWith('aws lambda update-function-code'))).toBe(false)
      expect(process.exitCode).toBe(1)
    })
  })

  it('deploys once the user confirms', async () => {
    confirmMock.mockResolvedValueOnce(true)
    const { calls } = stubCli()
    captureConsole()
    await withRepo(functionSources([fn]), async (dir) => {
      const report = await deployFunctions({ environment: 'Production', unit: fn, cwd: dir, region: 'us-east-1', interactive: true })
      expect(report?.succeeded).toBe(1)
      expect(calls.filter((c) => c.startsWith('aws lambda update-function-code'))).toHaveLength(1)
    })
  })

  it('does not prompt with --yes, --ci, outside a terminal or for other environments', async () => {
    stubCli()
    captureConsole()
    await withRepo(functionSources([fn]), async (dir) => {
      const base = { unit: fn, cwd: dir, region: 'us-east-1' }
      await deployFunctions({ ...base, environment: 'prod', interactive: true, yes: true })
      await deployFunctions({ ...base, environment: 'prod', interactive: true, ci: true })
      await deployFunctions({ ...base, environment: 'prod', interactive: false })
      await deployFunctions({ ...base, environment: 'staging', interactive: true })
      expect(confirmMock).not.toHaveBeenCalled()
      expect(process.exitCode ?? 0).toBe(0)
    })
  })
})
