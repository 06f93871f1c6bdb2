import {mkdir, rm, writeFile} from 'node:fs/promises'
import {join, resolve} from 'node:path'
import test from 'ava'
import {createTmpDir} from '../../__tests__/helpers.js'
import {resolveDescriptorFile, resolveWorkdir} from '../utils.js'

// -- resolveDescriptorFile ---------------------------------------------------

test('resolveDescriptorFile: first candidate in a directory wins', async t => {
  const dir = await createTmpDir()
  try {
    await writeFile(join(dir, 'docker-compose.yml'), 'services: {}\n')
    await writeFile(join(dir, 'compose.yaml'), 'services: {}\n')
    t.is(await resolveDescriptorFile(dir), join(dir, 'compose.yaml'))

    await writeFile(join(dir, 'berth.yml'), 'services: {}\n')
    t.is(await resolveDescriptorFile(dir), join(dir, 'berth.yml'))
  } finally {
    await rm(dir, {recursive: true, force: true})
  }
})

test('resolveDescriptorFile: a file is used as is', async t => {
  const dir = await createTmpDir()
  try {
    await writeFile(join(dir, 'stack.yml'), 'services: {}\n')
    t.is(await resolveDescriptorFile(join(dir, 'stack.yml')), join(dir, 'stack.yml'))
  } finally {
    await rm(dir, {recursive: true, force: true})
  }
})

test('resolveDescriptorFile: missing path', async t => {
  const dir = await createTmpDir()
  try {
    const missing = join(dir, 'nope')
    await t.throwsAsync(resolveDescriptorFile(missing), {message: `Path does not exist: ${missing}`})
  } finally {
    await rm(dir, {recursive: true, force: true})
  }
})

test('resolveDescriptorFile: directory without a descriptor', async t => {
  const dir = await createTmpDir()
  try {
    await mkdir(join(dir, 'empty'))
    await t.throwsAsync(resolveDescriptorFile(join(dir, 'empty')), {
      message: `No descriptor file found in ${join(dir, 'empty')}. Expected one of: berth.yml, berth.yaml, compose.yaml, compose.yml, docker-compose.yaml, docker-compose.yml`
    })
  } finally {
    await rm(dir, {recursive: true, force: true})
  }
})

// -- resolveWorkdir ----------------------------------------------------------

test('resolveWorkdir: flag, then environment, then config, then default', t => {
  t.is(resolveWorkdir('/opt/flag', {workdir: '/opt/config'}, {BERTH_WORKDIR: '/opt/env'}), '/opt/flag')
  t.is(resolveWorkdir(undefined, {workdir: '/opt/config'}, {BERTH_WORKDIR: '/opt/env'}), '/opt/env')
  t.is(resolveWorkdir(undefined, {workdir: '/opt/config'}, {}), '/opt/config')
  t.is(resolveWorkdir(undefined, {}, {}), resolve('.berth'))
})
