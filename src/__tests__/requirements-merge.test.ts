import { describe, it, expect } from 'vitest'
import { join, resolve } from 'node:path'
import { mergeRequirements, normalizeName, parseRequirements } from '../core/packaging/requirements'

describe('parseRequirements', () => {
  it('drops comments and blank lines and normalizes names', () => {
    const lines = parseRequirements([
      'requests==2.31.0',
      '# pinned for the SAM client',
      'boto3>=1.28  # inline note',
      '-r other.txt',
      'PyYAML[extra]==6.0',
      ''
    ].join('\n'))
    expect(lines).toEqual([
      { raw: 'requests==2.31.0', name: 'requests' },
      { raw: 'boto3>=1.28', name: 'boto3' },
      { raw: '-r other.txt' },
      { raw: 'PyYAML[extra]==6.0', name: 'pyyaml' }
    ])
  })

  it('treats separators as equivalent', () => {
    expect(normalizeName('Python_Dateutil')).toBe('python-dateutil')
    expect(normalizeName('zope.interface')).toBe('zope-interface')
    expect(normalizeName('a__-._b')).toBe('a-b')
  })
})

describe('mergeRequirements', () => {
  it('keeps the unit pin when both manifests name a project', () => {
    const unit = parseRequirements('requests==2.31.0\nPython_Dateutil==2.8.2\n')
    const base = parseRequirements('requests==2.28.0\npython-dateutil>=2.8\nboto3==1.34.0\n--index-url https://pypi.example.test/simple\n')
    const merged = mergeRequirements(unit, base)
    expect(merged.lines).toEqual([
      'requests==2.31.0',
      'Python_Dateutil==2.8.2',
      'boto3==1.34.0',
      '--index-url https://pypi.example.test/simple'
    ])
    expect(merged.overridden).toEqual(['requests', 'python-dateutil'])
  })

  it('returns the base manifest alone when the unit has none', () => {
    const merged = mergeRequirements([], parseRequirements('boto3==1.34.0\n'))
    expect(merged.lines).toEqual(['boto3==1.34.0'])
    expect(merged.overridden).toEqual([])
  })

  it('does not repeat identical option lines', () => {
    const merged = mergeRequirements(parseRequirements('--prefer-binary\nx==1\n'), parseRequirements('--prefer-binary\ny==2\n'))
    expect(merged.lines).toEqual(['--prefer-binary', 'x==1', 'y==2'])
  })
})

describe('relative paths', () => {
  const unitDir = resolve('/repo/lambdas/sam-a')
  const rootDir = resolve('/repo')

  it('rebases file operands onto the manifest directory', () => {
    const lines = parseRequirements([
      '-r common.txt',
      '--constraint=constraints.txt',
      '-e .',
      './wheels/tool-1.0-py3-none-any.whl',
      '-e git+https://git.example.test/lib.git#egg=lib',
      '--index-url https://pypi.example.test/simple',
      '-r /etc/pinned.txt',
      'requests==2.31.0'
    ].join('\n'), unitDir)
    expect(lines.map((l) => l.raw)).toEqual([
      `-r ${join(unitDir, 'common.txt')}`,
      `--constraint=${join(unitDir, 'constraints.txt')}`,
      `-e ${unitDir}`,
      join(unitDir, 'wheels', 'tool-1.0-py3-none-any.whl'),
      '-e git+https://git.example.test/lib.git#egg=lib',
      '--index-url https://pypi.example.test/simple',
      '-r /etc/pinned.txt',
      'requests==2.31.0'
    ])
  })

  it('keeps same-named includes from different manifests apart', () => {
    const merged = mergeRequirements(parseRequirements('-r common.txt\n', unitDir), parseRequirements('-r common.txt\n', rootDir))
    expect(merged.lines).toEqual([`-r ${join(unitDir, 'common.txt')}`, `-r ${join(rootDir, 'common.txt')}`])
  })

  it('leaves lines untouched without a base directory', () => {
    expect(parseRequirements('-r common.txt\n./local.whl\n').map((l) => l.raw)).toEqual(['-r common.txt', './local.whl'])
  })
})
