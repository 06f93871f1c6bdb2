import {mkdir, rm, writeFile} from 'node:fs/promises'
import {dirname, join} from 'node:path'
import {fileURLToPath} from 'node:url'
import test from 'ava'
import {createTmpDir} from '../../__tests__/helpers.js'
import {
  DependencyCycleError,
  DuplicateServiceError,
  MalformedDescriptorError,
  UnknownReferenceError
} from '../../errors.js'
import {DescriptorLoader} from '../descriptor-loader.js'

const file = '/srv/mlops/compose.yaml'

function parse(content: string, variables: Record<string, string> = {}) {
  return new DescriptorLoader().parse(content, file, variables)
}

const mlopsStack = `
name: MLOps Demo
networks:
  mlops:
    driver: bridge
services:
  minio:
    image: minio/minio:latest
    command: server /data --console-address ":9001"
    ports:
      - "127.0.0.1:9000:9000"
      - "127.0.0.1:9001:9001"
    volumes:
      - ./minio_data:/data
    env_file: .env
    healthcheck:
      test: ["CMD", "curl", "-f", "http://localhost:9000/minio/health/live"]
      interval: 30s
      timeout: 20s
      retries: 3
    networks:
      - mlops
  mlflow:
    image: ghcr.io/mlflow/mlflow:latest
    restart: always
    ports:
      - "127.0.0.1:5000:5000"
    env_file:
      - .env
    environment:
      MLFLOW_S3_ENDPOINT_URL: http://minio:9000
    depends_on:
      - minio
    networks:
      - mlops
`

// -- full descriptor ---------------------------------------------------------

test('parse: resolves services, networks and the project name', t => {
  const stack = parse(mlopsStack)
  t.is(stack.name, 'mlops-demo')
  t.is(stack.root, '/srv/mlops')
  t.is(stack.file, file)
  t.deepEqual(stack.services.map(s => s.name), ['minio', 'mlflow'])
  t.deepEqual(stack.networks, [{name: 'mlops', driver: 'bridge', external: false}])
  t.deepEqual(stack.volumes, [])
})

test('parse: service details', t => {
  const [minio, mlflow] = parse(mlopsStack).services
  t.deepEqual(minio.command, ['server', '/data', '--console-address', ':9001'])
  t.deepEqual(minio.ports, [
    {hostIp: '127.0.0.1', hostPort: 9000, containerPort: 9000, protocol: 'tcp'},
    {hostIp: '127.0.0.1', hostPort: 9001, containerPort: 9001, protocol: 'tcp'}
  ])
  t.deepEqual(minio.volumes, [{type: 'bind', source: '/srv/mlops/minio_data', target: '/data', readOnly: false}])
  t.deepEqual(minio.envFiles, [{path: '/srv/mlops/.env', required: true}])
  t.deepEqual(minio.healthcheck, {
    test: ['curl', '-f', 'http://localhost:9000/minio/health/live'],
    intervalMs: 30_000,
    timeoutMs: 20_000,
    startPeriodMs: 0,
    retries: 3
  })
  t.deepEqual(minio.restart, {mode: 'no'})
  t.deepEqual(minio.networks, [{name: 'mlops', aliases: []}])

  t.deepEqual(mlflow.restart, {mode: 'always'})
  t.deepEqual(mlflow.environment, {MLFLOW_S3_ENDPOINT_URL: 'http://minio:9000'})
  t.deepEqual(mlflow.dependsOn, [{service: 'minio', required: true}])
  t.is(mlflow.healthcheck, undefined)
})

test('parse: project name falls back to the directory name', t => {
  const stack = parse('services:\n  web:\n    image: nginx\n')
  t.is(stack.name, 'mlops')
})

test('parse: project name option wins', t => {
  const stack = new DescriptorLoader({projectName: 'Other Name'}).parse('name: ignored\nservices:\n  web:\n    image: nginx\n', file)
  t.is(stack.name, 'other-name')
})

test('parse: implicit default network', t => {
  const stack = parse('services:\n  web:\n    image: nginx\n')
  t.deepEqual(stack.services[0].networks, [{name: 'default', aliases: []}])
  t.deepEqual(stack.networks, [{name: 'default', driver: 'bridge', external: false}])
})

test('parse: long syntax forms', t => {
  const stack = parse(`
services:
  db:
    image: postgres:16
    healthcheck:
      test: pg_isready
      start_period: 5s
  api:
    build:
      context: ./api
      dockerfile: Dockerfile.dev
      args:
        - VERSION=1
    ports:
      - target: 80
        published: 8080
    volumes:
      - type: volume
        source: cache
        target: /cache
        read_only: true
    env_file:
      - path: ./api.env
        required: false
    environment:
      - DEBUG=1
      - FROM_HOST
      - UNSET_VAR
    depends_on:
      db:
        condition: service_healthy
        required: false
    networks:
      back:
        aliases: [backend]
    stop_grace_period: 1m
volumes:
  cache:
networks:
  back:
    external: true
`, {FROM_HOST: 'yes'})

  const [db, api] = stack.services
  t.deepEqual(db.healthcheck, {test: ['sh', '-c', 'pg_isready'], intervalMs: 30_000, timeoutMs: 30_000, startPeriodMs: 5000, retries: 3})
  t.deepEqual(api.build, {context: '/srv/mlops/api', dockerfile: 'Dockerfile.dev', args: {VERSION: '1'}})
  t.is(api.image, undefined)
  t.deepEqual(api.ports, [{hostIp: '127.0.0.1', hostPort: 8080, containerPort: 80, protocol: 'tcp'}])
  t.deepEqual(api.volumes, [{type: 'volume', source: 'cache', target: '/cache', readOnly: true}])
  t.deepEqual(api.envFiles, [{path: '/srv/mlops/api.env', required: false}])
  t.deepEqual(api.environment, {DEBUG: '1', FROM_HOST: 'yes'})
  t.deepEqual(api.dependsOn, [{service: 'db', condition: 'service_healthy', required: false}])
  t.deepEqual(api.networks, [{name: 'back', aliases: ['backend']}])
  t.is(api.stopGracePeriodMs, 60_000)
  t.deepEqual(stack.volumes, [{name: 'cache', driver: 'local', external: false}])
  t.deepEqual(stack.networks, [
    {name: 'back', driver: 'bridge', external: true},
    {name: 'default', driver: 'bridge', external: false}
  ])
})

test('parse: mapping environment stringifies scalars', t => {
  const stack = parse('services:\n  web:\n    image: nginx\n    environment:\n      PORT: 8080\n      DEBUG: true\n      EMPTY:\n')
  t.deepEqual(stack.services[0].environment, {PORT: '8080', DEBUG: 'true', EMPTY: ''})
})

test('parse: interpolation, x- extensions and version are accepted', t => {
  const stack = parse(`
version: "3.9"
x-common: &common
  restart: always
services:
  web:
    image: nginx:\${TAG:-latest}
    ports:
      - "\${PORT}:80"
`, {PORT: '8080'})
  t.is(stack.services[0].image, 'nginx:latest')
  t.is(stack.services[0].ports[0].hostPort, 8080)
})

test('parse: disabled health checks', t => {
  const stack = parse(`
services:
  a:
    image: nginx
    healthcheck:
      disable: true
  b:
    image: nginx
    healthcheck:
      test: ["NONE"]
`)
  t.is(stack.services[0].healthcheck, undefined)
  t.is(stack.services[1].healthcheck, undefined)
})

// -- errors ------------------------------------------------------------------

test('parse: YAML syntax error', t => {
  const error = t.throws(() => parse('services:\n  web: [unclosed\n'), {instanceOf: MalformedDescriptorError})
  t.is(error?.code, 'MALFORMED_DESCRIPTOR')
  t.true(error?.message.startsWith('compose.yaml: '))
})

test('parse: unknown service key names the path', t => {
  const error = t.throws(() => parse('services:\n  web:\n    image: nginx\n    deploy:\n      replicas: 2\n'), {instanceOf: MalformedDescriptorError})
  t.is(error?.message, 'services.web: Unrecognized key(s) in object: \'deploy\'')
})

test('parse: service without image or build', t => {
  const error = t.throws(() => parse('services:\n  web:\n    command: echo hi\n'), {instanceOf: MalformedDescriptorError})
  t.is(error?.message, 'services.web: either "image" or "build" is required')
})

test('parse: no services', t => {
  const error = t.throws(() => parse('services: {}\n'), {instanceOf: MalformedDescriptorError})
  t.is(error?.message, 'services: at least one service is required')
})

test('parse: invalid short syntax names the path', t => {
  const error = t.throws(() => parse('services:\n  api:\n    image: nginx\n    ports:\n      - "8000-8001:80"\n'), {instanceOf: MalformedDescriptorError})
  t.is(error?.message, 'services.api.ports[0]: port ranges are not supported (\'8000-8001:80\')')
})

test('parse: repeated service name', t => {
  const error = t.throws(() => parse('services:\n  web:\n    image: nginx\n  web:\n    image: httpd\n'), {instanceOf: DuplicateServiceError})
  t.is(error?.message, 'Service \'web\' is defined more than once')
  t.is(error?.code, 'DUPLICATE_SERVICE')
})

test('parse: repeated key elsewhere is malformed', t => {
  const error = t.throws(() => parse('services:\n  web:\n    image: nginx\n    image: httpd\n'), {instanceOf: MalformedDescriptorError})
  t.is(error?.message, 'services.web.image: duplicate key \'image\'')
})

test('parse: two services with the same container name', t => {
  const error = t.throws(() => parse('services:\n  a:\n    image: nginx\n    container_name: web\n  b:\n    image: nginx\n    container_name: web\n'), {instanceOf: DuplicateServiceError})
  t.is(error?.message, 'Container name \'web\' is used by both \'a\' and \'b\'')
})

test('parse: unknown dependency', t => {
  const error = t.throws(() => parse('services:\n  api:\n    image: nginx\n    depends_on: [db]\n'), {instanceOf: UnknownReferenceError})
  t.is(error?.message, 'Service \'api\' references unknown service \'db\'')
})

test('parse: unknown network', t => {
  const error = t.throws(() => parse('services:\n  api:\n    image: nginx\n    networks: [front]\n'), {instanceOf: UnknownReferenceError})
  t.is(error?.message, 'Service \'api\' references unknown network \'front\'')
})

test('parse: unknown named volume', t => {
  const error = t.throws(() => parse('services:\n  api:\n    image: nginx\n    volumes: ["data:/data"]\n'), {instanceOf: UnknownReferenceError})
  t.is(error?.message, 'Service \'api\' references unknown volume \'data\'')
})

test('parse: dependency cycle', t => {
  const error = t.throws(() => parse('services:\n  a:\n    image: nginx\n    depends_on: [b]\n  b:\n    image: nginx\n    depends_on: [a]\n'), {instanceOf: DependencyCycleError})
  t.is(error?.message, 'Dependency cycle detected: a -> b -> a')
})

test('parse: required variable missing', t => {
  const error = t.throws(() => parse('services:\n  api:\n    image: ${IMAGE:?IMAGE must be set}\n'), {instanceOf: MalformedDescriptorError})
  t.is(error?.message, 'services.api.image: IMAGE must be set')
})

test('parse: service_healthy on a dependency without a health check', t => {
  const error = t.throws(() => parse('services:\n  db:\n    image: postgres\n  api:\n    image: nginx\n    depends_on:\n      db:\n        condition: service_healthy\n'), {instanceOf: MalformedDescriptorError})
  t.is(error?.message, 'services.api.depends_on.db: condition \'service_healthy\' requires \'db\' to declare a health check')
})

test('parse: service_healthy on a dependency whose health check is disabled', t => {
  const error = t.throws(() => parse('services:\n  db:\n    image: postgres\n    healthcheck:\n      disable: true\n  api:\n    image: nginx\n    depends_on:\n      db:\n        condition: service_healthy\n'), {instanceOf: MalformedDescriptorError})
  t.is(error?.message, 'services.api.depends_on.db: condition \'service_healthy\' requires \'db\' to declare a health check')
})

test('parse: invalid build argument names the service', t => {
  const error = t.throws(() => parse('services:\n  api:\n    build:\n      context: ./api\n      args:\n        - "=1"\n'), {instanceOf: MalformedDescriptorError})
  t.is(error?.message, 'services.api.build.args: invalid entry \'=1\'')
})

// -- load --------------------------------------------------------------------

test('load: reads the descriptor and the .env beside it', async t => {
  const dir = await createTmpDir()
  try {
    await mkdir(join(dir, 'stack'))
    await writeFile(join(dir, 'stack', '.env'), 'TAG=1.27\nPORT=8080\n')
    await writeFile(join(dir, 'stack', 'compose.yaml'), 'services:\n  web:\n    image: nginx:${TAG}\n    ports: ["${PORT}:80"]\n')
    const stack = await new DescriptorLoader({environment: {PORT: '9090'}}).load(join(dir, 'stack', 'compose.yaml'))
    t.is(stack.name, 'stack')
    t.is(stack.services[0].image, 'nginx:1.27')
    t.is(stack.services[0].ports[0].hostPort, 9090)
  } finally {
    await rm(dir, {recursive: true, force: true})
  }
})

test('load: works without a .env file', async t => {
  const dir = await createTmpDir()
  try {
    await writeFile(join(dir, 'compose.yaml'), 'name: demo\nservices:\n  web:\n    image: nginx\n')
    const stack = await new DescriptorLoader({environment: {}}).load(join(dir, 'compose.yaml'))
    t.is(stack.name, 'demo')
  } finally {
    await rm(dir, {recursive: true, force: true})
  }
})

test('load: the bundled mlops stack', async t => {
  const file = fileURLToPath(new URL('../../../examples/mlops/compose.yaml', import.meta.url))
  const stack = await new DescriptorLoader({environment: {}}).load(file)
  const [minio, mlflow, api] = stack.services

  t.is(stack.name, 'mlops')
  t.deepEqual(stack.services.map(s => s.name), ['minio', 'mlflow', 'api'])
  t.deepEqual(stack.networks, [{name: 'mlops', driver: 'bridge', external: false}])
  t.true(stack.services.every(s => s.ports.every(port => port.hostIp === '127.0.0.1')))
  t.deepEqual(minio.volumes, [{type: 'bind', source: join(dirname(file), 'minio', 'data'), target: '/data', readOnly: false}])
  t.deepEqual(mlflow.command, [
    'mlflow',
    'server',
    '--backend-store-uri',
    'sqlite:////mlflow/mlruns.db',
    '--default-artifact-root',
    's3://mlflow/artifacts',
    '--host',
    '0.0.0.0'
  ])
  t.deepEqual(mlflow.dependsOn, [{service: 'minio', condition: 'service_healthy', required: true}])
  t.deepEqual(api.restart, {mode: 'always'})
  t.deepEqual(api.dependsOn, [{service: 'minio', required: true}])
})
