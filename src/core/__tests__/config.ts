import {writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {ValidationError} from '../../errors.js'
import {createTmpDir} from '../../__tests__/helpers.js'
import {loadConfig, parseConfig} from '../config.js'

test('loadConfig: returns an empty config when the file does not exist', async t => {
  const dir = await createTmpDir()
  t.deepEqual(await loadConfig(join(dir, '.source-step.yml')), {})
})

test('loadConfig: returns an empty config for an empty file', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, '.source-step.yml'), '')
  t.deepEqual(await loadConfig(join(dir, '.source-step.yml')), {})
})

test('loadConfig: reads a full configuration', async t => {
  const dir = await createTmpDir()
  const file = join(dir, '.source-step.yml')
  await writeFile(file, [
    'namespace: ci-op-1',
    'step:',
    '  from: root',
    '  to: src',
    '  clonerefsImage:',
    '    namespace: ci',
    '    name: clonerefs',
    '    tag: latest',
    '  clonerefsPath: /clonerefs',
    'resources:',
    '  "*":',
    '    requests:',
    '      cpu: 100m',
    '  src:',
    '    limits:',
    '      cpu: 2',
    'cloneAuth:',
    '  secretName: clone-secret',
    '  type: SSH',
    'pullSecret: true',
    'pollIntervalMs: 2000',
    'infra:',
    '  reasons: [RegistryOverloaded]',
    ''
  ].join('\n'))

  t.deepEqual(await loadConfig(file), {
    namespace: 'ci-op-1',
    step: {
      from: 'root',
      to: 'src',
      clonerefsImage: {namespace: 'ci', name: 'clonerefs', tag: 'latest'},
      clonerefsPath: '/clonerefs'
    },
    resources: {
      '*': {requests: {cpu: '100m'}},
      src: {limits: {cpu: '2'}}
    },
    cloneAuth: {secretName: 'clone-secret', type: 'SSH'},
    pullSecret: true,
    pollIntervalMs: 2000,
    infra: {reasons: ['RegistryOverloaded'], logHints: undefined}
  })
})

test('parseConfig: rejects an unknown clone auth type', t => {
  const error = t.throws(() => parseConfig({cloneAuth: {secretName: 'clone-secret', type: 'Token'}}), {instanceOf: ValidationError})
  t.is(error?.message, 'Invalid config: cloneAuth.type must be SSH or OAuth')
})

test('parseConfig: rejects an incomplete step', t => {
  const error = t.throws(() => parseConfig({step: {from: 'root'}}), {instanceOf: ValidationError})
  t.is(error?.message, 'Invalid config: step.to must be a non-empty string')
})

test('parseConfig: rejects a non-positive poll interval', t => {
  t.throws(() => parseConfig({pollIntervalMs: 0}), {instanceOf: ValidationError})
  t.throws(() => parseConfig({pollIntervalMs: '5s'}), {instanceOf: ValidationError})
})

test('parseConfig: rejects log hints that are not strings', t => {
  const error = t.throws(() => parseConfig({infra: {logHints: [42]}}), {instanceOf: ValidationError})
  t.is(error?.message, 'Invalid config: infra.logHints must be a list of strings')
})

test('parseConfig: rejects a list at the top level', t => {
  t.throws(() => parseConfig(['step']), {instanceOf: ValidationError})
})
