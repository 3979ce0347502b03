import {access} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {buildEnvCommand, buildInstallCommand, installDependencies} from '../installer.js'
import {DependenciesError, TopologyError} from '../../errors.js'
import type {InstallerOptions} from '../../types.js'
import {createTmpDir, fakeRunner, recordingReporter} from '../../__tests__/helpers.js'

const defaults: InstallerOptions = {systemPackages: false, verbose: false}

// -- command builders --------------------------------------------------------

test('buildEnvCommand targets the env directory', t => {
  t.deepEqual(buildEnvCommand({systemPackages: false}), {file: 'virtualenv', args: ['topology_venv']})
})

test('buildEnvCommand appends --system-site-packages on request', t => {
  t.deepEqual(buildEnvCommand({systemPackages: true}), {file: 'virtualenv', args: ['topology_venv', '--system-site-packages']})
})

test('buildInstallCommand runs the env pip against the manifest', t => {
  t.deepEqual(buildInstallCommand('/work/myjob/requirements.txt', {}), {
    file: join('topology_venv', 'bin', 'pip'),
    args: ['install', '-r', '/work/myjob/requirements.txt']
  })
})

test('buildInstallCommand appends index URL and log path', t => {
  const command = buildInstallCommand('/work/myjob/requirements.txt', {
    indexUrl: 'https://pypi.example.test/simple/',
    installLog: '/work/pip.log'
  })
  t.deepEqual(command.args, [
    'install', '-r', '/work/myjob/requirements.txt',
    '-i', 'https://pypi.example.test/simple/',
    '--log', '/work/pip.log'
  ])
})

test('buildInstallCommand appends only the options given', t => {
  t.deepEqual(buildInstallCommand('req.txt', {installLog: 'pip.log'}).args, ['install', '-r', 'req.txt', '--log', 'pip.log'])
  t.deepEqual(buildInstallCommand('req.txt', {indexUrl: 'https://pypi.example.test/'}).args, ['install', '-r', 'req.txt', '-i', 'https://pypi.example.test/'])
})

// -- installDependencies -----------------------------------------------------

test('installDependencies runs virtualenv then pip from the resources directory', async t => {
  const resources = await createTmpDir()
  const {runner, calls} = fakeRunner()
  const {reporter} = recordingReporter()

  await installDependencies(resources, '/work/myjob/requirements.txt', {...defaults, systemPackages: true}, runner, reporter)

  t.deepEqual(calls, [
    {file: 'virtualenv', args: ['topology_venv', '--system-site-packages'], cwd: resources},
    {file: join('topology_venv', 'bin', 'pip'), args: ['install', '-r', '/work/myjob/requirements.txt'], cwd: resources}
  ])
  await t.notThrowsAsync(async () => access(join(resources, 'topology_venv', 'bin', 'pip')))
})

test('installDependencies reports each command before running it', async t => {
  const resources = await createTmpDir()
  const {runner} = fakeRunner()
  const {reporter, events} = recordingReporter()

  await installDependencies(resources, 'requirements.txt', defaults, runner, reporter)

  t.deepEqual(events, [
    {event: 'COMMAND_STARTING', cwd: resources, command: ['virtualenv', 'topology_venv']},
    {event: 'COMMAND_STARTING', cwd: resources, command: [join('topology_venv', 'bin', 'pip'), 'install', '-r', 'requirements.txt']}
  ])
})

test('installDependencies fails with ENV_CREATE_FAILED and skips pip', async t => {
  const resources = await createTmpDir()
  const {runner, calls} = fakeRunner({env: 1})
  const {reporter} = recordingReporter()

  const error = await t.throwsAsync(
    async () => installDependencies(resources, 'requirements.txt', defaults, runner, reporter),
    {instanceOf: DependenciesError}
  )

  t.true(error instanceof TopologyError)
  t.is(error?.code, 'ENV_CREATE_FAILED')
  t.regex(error?.message ?? '', /failed to create isolated environment/)
  t.is(calls.length, 1)
})

test('installDependencies fails with INSTALL_FAILED when pip fails', async t => {
  const resources = await createTmpDir()
  const {runner, calls} = fakeRunner({install: 2})
  const {reporter} = recordingReporter()

  const error = await t.throwsAsync(
    async () => installDependencies(resources, 'requirements.txt', defaults, runner, reporter),
    {instanceOf: DependenciesError}
  )

  t.is(error?.code, 'INSTALL_FAILED')
  t.regex(error?.message ?? '', /rerun with --verbose/)
  t.is(calls.length, 2)
})

test('installDependencies forwards output only when verbose', async t => {
  const quiet = recordingReporter()
  await installDependencies(await createTmpDir(), 'requirements.txt', defaults, fakeRunner({}, ['Collecting simplejson']).runner, quiet.reporter)
  t.deepEqual(quiet.lines, [])

  const loud = recordingReporter()
  await installDependencies(await createTmpDir(), 'requirements.txt', {...defaults, verbose: true}, fakeRunner({}, ['Collecting simplejson']).runner, loud.reporter)
  t.deepEqual(loud.lines, ['Collecting simplejson', 'Collecting simplejson'])
})
