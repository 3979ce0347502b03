import process from 'node:process'
import {realpath} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {execaRunner} from '../process-runner.js'
import {createTmpDir} from '../../__tests__/helpers.js'

// The runner is exercised against the Node binary running the tests.
const node = process.execPath

test('execaRunner returns the exit code', async t => {
  const cwd = await createTmpDir()
  t.is(await execaRunner({file: node, args: ['-e', 'process.exit(0)']}, {cwd}), 0)
  t.is(await execaRunner({file: node, args: ['-e', 'process.exit(3)']}, {cwd}), 3)
})

test('execaRunner merges stdout and stderr into the line callback', async t => {
  const cwd = await createTmpDir()
  const lines: string[] = []
  const code = await execaRunner(
    {file: node, args: ['-e', 'console.log("to stdout"); console.error("to stderr")']},
    {cwd, onLine: line => lines.push(line)}
  )
  t.is(code, 0)
  t.deepEqual(lines.sort(), ['to stderr', 'to stdout'])
})

test('execaRunner runs in the given working directory', async t => {
  const cwd = await createTmpDir()
  const lines: string[] = []
  await execaRunner({file: node, args: ['-e', 'console.log(process.cwd())']}, {cwd, onLine: line => lines.push(line)})
  t.deepEqual(lines, [await realpath(cwd)])
})

test('execaRunner discards output without a callback', async t => {
  const cwd = await createTmpDir()
  const code = await execaRunner({file: node, args: ['-e', 'for (let i = 0; i < 1000; i++) console.log(i)']}, {cwd})
  t.is(code, 0)
})

test('execaRunner reports a non-zero code when the command cannot start', async t => {
  const cwd = await createTmpDir()
  const code = await execaRunner({file: join(cwd, 'no-such-tool'), args: []}, {cwd})
  t.not(code, 0)
})
