import test from 'ava'
import {FakeRuntime} from '../../__tests__/helpers.js'
import type {RestartBackoff, RestartPolicy} from '../../types.js'
import {ServiceRegistry} from '../service-state.js'
import {RestartSupervisor, type RestartNotice} from '../supervisor.js'

const fastBackoff: RestartBackoff = {initialDelayMs: 1, maxDelayMs: 100, resetAfterMs: 60_000}

/**
 * A running `api` service backed by the fake runtime, and a relaunch that
 * restarts its container.
 */
async function setup(policy: RestartPolicy, options: {backoff?: RestartBackoff; comesBack?: boolean} = {}) {
  const fake = new FakeRuntime()
  const trail: string[] = []
  const registry = new ServiceRegistry((_service, _from, to) => {
    trail.push(to)
  })
  registry.register('api', 'demo-api')
  registry.transition('api', 'creating')
  await fake.createContainer({
    name: 'demo-api',
    project: 'demo',
    service: 'api',
    image: 'api:latest',
    env: {},
    ports: [],
    mounts: [],
    networks: [],
    restart: 'no'
  })
  await fake.startContainer('demo-api')
  registry.transition('api', 'running')

  const notices: RestartNotice[] = []
  const controller = new AbortController()
  const relaunched: Array<() => void> = []
  let relaunches = 0

  const supervisor = new RestartSupervisor({
    runtime: fake,
    registry,
    backoff: options.backoff ?? fastBackoff,
    signal: controller.signal,
    onRestarting(notice) {
      notices.push(notice)
    }
  })

  const watching = supervisor.watch({
    name: 'api',
    container: 'demo-api',
    policy,
    async relaunch() {
      relaunches++
      registry.transition('api', 'creating')
      if (options.comesBack === false) {
        registry.transition('api', 'failed')
        relaunched.shift()?.()
        return false
      }

      await fake.startContainer('demo-api')
      registry.transition('api', 'running')
      relaunched.shift()?.()
      return true
    }
  })

  return {
    fake,
    registry,
    trail,
    notices,
    controller,
    watching,
    get relaunches() {
      return relaunches
    },
    nextRelaunch() {
      return new Promise<void>(resolve => {
        relaunched.push(resolve)
      })
    }
  }
}

test('always: restarts an exited container', async t => {
  const s = await setup({mode: 'always'})
  const relaunched = s.nextRelaunch()
  s.fake.exit('demo-api', 1)
  await relaunched

  t.deepEqual(s.notices, [{service: 'api', attempt: 1, delayMs: 1, exitCode: 1}])
  t.is(s.registry.get('api').restarts, 1)
  t.deepEqual(s.trail, ['creating', 'running', 'restarting', 'creating', 'running'])

  s.controller.abort()
  await s.watching
  t.is(s.relaunches, 1)
})

test('always: backoff grows across quick crashes', async t => {
  const s = await setup({mode: 'always'})
  let relaunched = s.nextRelaunch()
  s.fake.exit('demo-api', 1)
  await relaunched
  relaunched = s.nextRelaunch()
  s.fake.exit('demo-api', 2)
  await relaunched

  t.deepEqual(s.notices.map(notice => [notice.attempt, notice.delayMs, notice.exitCode]), [[1, 1, 1], [2, 2, 2]])
  s.controller.abort()
  await s.watching
})

test('always: attempts reset once the container stayed up', async t => {
  const s = await setup({mode: 'always'}, {backoff: {initialDelayMs: 1, maxDelayMs: 100, resetAfterMs: 0}})
  let relaunched = s.nextRelaunch()
  s.fake.exit('demo-api', 1)
  await relaunched
  relaunched = s.nextRelaunch()
  s.fake.exit('demo-api', 1)
  await relaunched

  t.deepEqual(s.notices.map(notice => notice.attempt), [1, 1])
  s.controller.abort()
  await s.watching
})

test('no: an exited container is stopped', async t => {
  const s = await setup({mode: 'no'})
  s.fake.exit('demo-api', 1)
  await s.watching

  t.is(s.registry.state('api'), 'stopped')
  t.deepEqual(s.notices, [])
  t.is(s.relaunches, 0)
})

test('on-failure: a clean exit is not restarted', async t => {
  const s = await setup({mode: 'on-failure'})
  s.fake.exit('demo-api', 0)
  await s.watching

  t.is(s.registry.state('api'), 'stopped')
  t.is(s.relaunches, 0)
})

test('on-failure: gives up after the retry limit', async t => {
  const s = await setup({mode: 'on-failure', maxRetries: 1}, {comesBack: false})
  s.fake.exit('demo-api', 3)
  await s.watching

  t.is(s.relaunches, 1)
  t.is(s.registry.state('api'), 'failed')
  t.is(s.registry.get('api').restarts, 1)
})

test('abort ends the watch without restarting', async t => {
  const s = await setup({mode: 'always'})
  s.controller.abort()
  await s.watching

  t.is(s.relaunches, 0)
  t.is(s.registry.state('api'), 'running')
})
