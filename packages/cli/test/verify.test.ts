import { describe, it, expect, afterEach } from 'vitest'
import { mkdtemp, rm, mkdir, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import { tmpdir } from 'node:os'
import { verifyPackage } from '../src/lib/verifier.js'
import { openWorkspace } from '../src/lib/workspace.js'

async function createProject(files: Record<string, string>): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'msgdef-verify-'))
  await writeFile(join(dir, 'msgdef.yaml'), 'packagePath:\n  - src\n')
  for (const [filePath, content] of Object.entries(files)) {
    const fullPath = join(dir, filePath)
    await mkdir(dirname(fullPath), { recursive: true })
    await writeFile(fullPath, content)
  }
  return dir
}

async function verify(dir: string, packageName: string) {
  const workspace = await openWorkspace(dir, { env: {} })
  if (!workspace.ok) throw new Error(workspace.error)
  return verifyPackage(packageName, workspace.value)
}

const STD = {
  'src/std_msgs/package.yaml': 'name: std_msgs\nversion: "1.0.0"\n',
  'src/std_msgs/msg/Header.msg': 'uint32 seq\ntime stamp\nstring frame_id\n',
}

describe('verifyPackage', () => {
  const dirs: string[] = []
  afterEach(async () => {
    for (const d of dirs) await rm(d, { recursive: true, force: true })
    dirs.length = 0
  })

  it('passes for a package whose messages parse and resolve', async () => {
    const dir = await createProject({
      ...STD,
      'src/geo/package.yaml': 'name: geo\nversion: "1.0.0"\n',
      'src/geo/msg/Point.msg': 'float64 x\nfloat64 y\n',
      'src/geo/msg/PointStamped.msg': 'Header header\ngeo/Point point\n',
    })
    dirs.push(dir)

    const result = await verify(dir, 'geo')
    expect(result.passed).toBe(true)
    expect(result.issues).toEqual([])
    expect(result.messages).toEqual(['geo/Point', 'geo/PointStamped'])
  })

  it('fails for an unknown package', async () => {
    const dir = await createProject(STD)
    dirs.push(dir)

    const result = await verify(dir, 'geo')
    expect(result.passed).toBe(false)
    expect(result.issues[0].code).toBe('PACKAGE-NOT-FOUND')
  })

  it('reports messages that do not parse', async () => {
    const dir = await createProject({
      'src/geo/package.yaml': 'name: geo\nversion: "1.0.0"\n',
      'src/geo/msg/Bad.msg': 'float64 x y\n',
    })
    dirs.push(dir)

    const result = await verify(dir, 'geo')
    expect(result.passed).toBe(false)
    expect(result.issues).toHaveLength(1)
    expect(result.issues[0]).toMatchObject({ severity: 'error', code: 'MSG-PARSE', file: 'msg/Bad.msg' })
  })

  it('reports references that do not resolve', async () => {
    const dir = await createProject({
      'src/geo/package.yaml': 'name: geo\nversion: "1.0.0"\n',
      'src/geo/msg/Pose.msg': 'geo/Point position\nPoint relative\n',
      'src/geo/msg/Point.msg': 'float64 x\n',
    })
    dirs.push(dir)

    const result = await verify(dir, 'geo')
    expect(result.passed).toBe(false)
    expect(result.issues).toEqual([{
      severity: 'error',
      code: 'MSG-RESOLVE',
      message: 'Message type [Point] is invalid',
      file: 'msg/Pose.msg',
    }])
  })

  it('warns when a package has no messages', async () => {
    const dir = await createProject({ 'src/empty/package.yaml': 'name: empty\nversion: "1.0.0"\n' })
    dirs.push(dir)

    const result = await verify(dir, 'empty')
    expect(result.passed).toBe(true)
    expect(result.issues[0].code).toBe('MSG-DIR-MISSING')
  })

  it('reports a missing manifest for an explicitly mapped package', async () => {
    const dir = await createProject({ 'vendor/geo/msg/Point.msg': 'float64 x\n' })
    await writeFile(join(dir, 'msgdef.yaml'), 'packages:\n  geo: vendor/geo\n')
    dirs.push(dir)

    const result = await verify(dir, 'geo')
    expect(result.passed).toBe(false)
    expect(result.issues[0].code).toBe('MANIFEST-MISSING')
  })
})
