import {expect} from 'chai'
import chalk from 'chalk'
import {mkdtempSync, rmSync, writeFileSync} from 'fs'
import {tmpdir} from 'os'
import {join} from 'path'
import {readErrorMessage, run, usage} from '../src/Cli'
import {Recorder} from './Helpers'

describe('the command line', () => {
  let dir: string
  let level: typeof chalk.level

  before(() => {
    dir = mkdtempSync(join(tmpdir(), 'json-fmt-'))
    level = chalk.level
    chalk.level = 0
  })
  after(() => {
    rmSync(dir, {recursive: true, force: true})
    chalk.level = level
  })

  function file(name: string, content: string) {
    const path = join(dir, name)
    writeFileSync(path, content)
    return path
  }

  it('prints the formatted file', async () => {
    const out = new Recorder()
    const path = file('ok.json', '{"a":[1,2]}')
    expect(await run([path], out)).to.equal(0)
    expect(out.logs).to.deep.equal(['{\n  "a": [\n    1,\n    2\n  ]\n}'])
    expect(out.errors).to.deep.equal([])
  })
  it('accepts --color', async () => {
    const out = new Recorder()
    const path = file('color.json', '[true]')
    expect(await run(['--color', path], out)).to.equal(0)
    expect(out.logs).to.deep.equal(['[\n  true\n]'])
  })
  it('fails without a filename', async () => {
    const out = new Recorder()
    expect(await run([], out)).to.equal(1)
    expect(out.errors).to.deep.equal(['No filename provided'])
  })
  it('reports missing files', async () => {
    const out = new Recorder()
    const path = join(dir, 'missing.json')
    expect(await run([path], out)).to.equal(1)
    expect(out.errors).to.deep.equal([`No such file or directory: '${path}'`])
  })
  it('reports other read errors', async () => {
    const out = new Recorder()
    expect(await run([dir], out)).to.equal(1)
    expect(out.errors).to.deep.equal([
      `Error reading file '${dir}': EISDIR: illegal operation on a directory, read`])
  })
  it('reports tokenizer errors with their location', async () => {
    const out = new Recorder()
    const path = file('literal.json', '[\n  nulll\n]')
    expect(await run([path], out)).to.equal(1)
    expect(out.errors).to.deep.equal(
      [`${path}: Unexpected literal: 'nulll' (line 2, col 3)`])
    expect(out.logs).to.deep.equal([])
  })
  it('reports parser errors', async () => {
    const out = new Recorder()
    const path = file('comma.json', '[1,]')
    expect(await run([path], out)).to.equal(1)
    expect(out.errors).to.deep.equal([`${path}: Unexpected token: ']'`])
  })
  it('prints usage for --help', async () => {
    const out = new Recorder()
    expect(await run(['--help'], out)).to.equal(0)
    expect(out.logs).to.deep.equal([usage()])
  })
  it('prints usage for unknown options', async () => {
    const out = new Recorder()
    expect(await run(['--bogus'], out)).to.equal(1)
    expect(out.logs).to.deep.equal([usage()])
    expect(out.errors).to.deep.equal(['Unknown option: --bogus'])
  })
})

describe('readErrorMessage', () => {
  const failure = (code: string, message: string) =>
    Object.assign(new Error(message), {code})

  it('names missing files', () => {
    expect(readErrorMessage('a.json', failure('ENOENT', 'gone')))
      .to.equal("No such file or directory: 'a.json'")
  })
  it('names unreadable files', () => {
    expect(readErrorMessage('a.json', failure('EACCES', 'EACCES: permission denied')))
      .to.equal("Permission denied: 'a.json'")
  })
  it('passes other messages through', () => {
    expect(readErrorMessage('a.json', failure('EIO', 'EIO: i/o error')))
      .to.equal("Error reading file 'a.json': EIO: i/o error")
    expect(readErrorMessage('a.json', 'odd'))
      .to.equal("Error reading file 'a.json': odd")
  })
})
