import test from 'ava'
import {containerName, formatDuration, qualifiedName, slugify} from '../utils.js'

test('slugify', t => {
  t.is(slugify('MLOps Demo'), 'mlops-demo')
  t.is(slugify('Café Stack!'), 'cafe-stack')
  t.is(slugify('--my_app--'), 'my_app')
  t.is(slugify('already-valid'), 'already-valid')
})

test('formatDuration', t => {
  t.is(formatDuration(250), '250ms')
  t.is(formatDuration(1500), '1.5s')
  t.is(formatDuration(90_000), '1m 30s')
})

test('qualifiedName: project-scoped unless external', t => {
  t.is(qualifiedName('demo', 'mlops', false), 'demo_mlops')
  t.is(qualifiedName('demo', 'shared', true), 'shared')
})

test('containerName: explicit name wins', t => {
  t.is(containerName('demo', {name: 'api'}), 'demo-api')
  t.is(containerName('demo', {name: 'api', containerName: 'my-api'}), 'my-api')
})
