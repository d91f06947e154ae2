import { describe, it, expect } from 'vitest'
import { chmod, readFile, symlink } from 'node:fs/promises'
import { join } from 'node:path'
import AdmZip from 'adm-zip'
import { archiveEntries, createArchive, isExcluded } from '../core/packaging/archive'
import { captureConsole } from '../../tests/helpers/cli-stub'
import { withRepo } from '../../tests/helpers/repo'

describe('isExcluded', () => {
  it('matches transient build and VCS artifacts', () => {
    expect(isExcluded('handler.pyc')).toBe(true)
    expect(isExcluded('lib/__pycache__/util.cpython-311.pyc')).toBe(true)
    expect(isExcluded('lib/__pycache__/README')).toBe(true)
    expect(isExcluded('lib/.DS_Store')).toBe(true)
    expect(isExcluded('.git/HEAD')).toBe(true)
    expect(isExcluded('.github/workflows/ci.yml')).toBe(true)
    expect(isExcluded('handler.py')).toBe(false)
    expect(isExcluded('shared/db.py')).toBe(false)
  })
})

describe('createArchive', () => {
  it('zips files in sorted order without excluded entries', async () => {
    await withRepo({
      'pkg/handler.py': 'print("hi")\n',
      'pkg/lib/util.py': 'X = 1\n',
      'pkg/lib/__pycache__/util.cpython-311.pyc': 'bytecode',
      'pkg/lib/.DS_Store': 'meta',
      'pkg/old.pyc': 'bytecode',
      'pkg/.git/HEAD': 'ref: refs/heads/main\n'
    }, async (dir) => {
      const zipPath = join(dir, 'out.zip')
      const size = await createArchive(join(dir, 'pkg'), zipPath)
      expect(size).toBe((await readFile(zipPath)).length)
      expect(archiveEntries(zipPath)).toEqual(['handler.py', 'lib/util.py'])
      const zip = new AdmZip(zipPath)
      expect(zip.readAsText('lib/util.py')).toBe('X = 1\n')
    })
  })

  it('produces identical bytes for unchanged input', async () => {
    await withRepo({ 'pkg/a.py': 'a\n', 'pkg/b/c.py': 'c\n' }, async (dir) => {
      await createArchive(join(dir, 'pkg'), join(dir, 'one.zip'))
      await new Promise((r) => setTimeout(r, 2100))
      await createArchive(join(dir, 'pkg'), join(dir, 'two.zip'))
      const one = await readFile(join(dir, 'one.zip'))
      const two = await readFile(join(dir, 'two.zip'))
      expect(one.equals(two)).toBe(true)
    })
  })

  it('keeps permission bits so executables stay executable', async () => {
    await withRepo({ 'pkg/bin/tool': '#!/bin/sh\necho hi\n', 'pkg/real.py': 'X = 1\n' }, async (dir) => {
      await chmod(join(dir, 'pkg', 'bin', 'tool'), 0o755)
      await chmod(join(dir, 'pkg', 'real.py'), 0o644)
      const zipPath = join(dir, 'out.zip')
      await createArchive(join(dir, 'pkg'), zipPath)
      const zip = new AdmZip(zipPath)
      const modeOf = (name: string): number => ((zip.getEntry(name)?.attr ?? 0) >>> 16) & 0o777
      expect(modeOf('bin/tool')).toBe(0o755)
      expect(modeOf('real.py')).toBe(0o644)
    })
  })

  it('follows symlinks to files and directories without looping', async () => {
    const { out } = captureConsole()
    await withRepo({ 'pkg/real.py': 'X = 1\n', 'pkg/lib/util.py': 'Y = 2\n' }, async (dir) => {
      const pkg = join(dir, 'pkg')
      await symlink('real.py', join(pkg, 'link.py'))
      await symlink('lib', join(pkg, 'alias'))
      await symlink('.', join(pkg, 'lib', 'self'))
      await symlink('missing.py', join(pkg, 'dangling.py'))
      const zipPath = join(dir, 'out.zip')
      await createArchive(pkg, zipPath)
      expect(archiveEntries(zipPath)).toEqual(['alias/util.py', 'lib/util.py', 'link.py', 'real.py'])
      expect(new AdmZip(zipPath).readAsText('link.py')).toBe('X = 1\n')
      expect(out.some((l) => l.startsWith('⚠ Skipping broken symlink dangling.py: '))).toBe(true)
    })
  })
})
