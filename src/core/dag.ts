import {DependencyCycleError, UnknownReferenceError} from '../errors.js'
import type {ServiceDefinition} from '../types.js'

/** Maps each service name to the set of services it depends on. */
export type ServiceGraph = Map<string, Set<string>>

/** Build a dependency graph from service definitions. */
export function buildGraph(services: ServiceDefinition[]): ServiceGraph {
  const graph: ServiceGraph = new Map()
  for (const service of services) {
    graph.set(service.name, new Set(service.dependsOn.map(dep => dep.service)))
  }

  return graph
}

/** Validate graph: check for unknown refs and cycles. */
export function validateGraph(graph: ServiceGraph): void {
  validateReferences(graph)
  detectCycles(graph)
}

function validateReferences(graph: ServiceGraph): void {
  for (const [name, deps] of graph) {
    for (const dep of deps) {
      if (!graph.has(dep)) {
        throw new UnknownReferenceError(name, 'service', dep)
      }
    }
  }
}

function detectCycles(graph: ServiceGraph): void {
  const remaining = new Set(graph.keys())
  for (const level of topologicalLevels(graph)) {
    for (const name of level) {
      remaining.delete(name)
    }
  }

  if (remaining.size > 0) {
    throw new DependencyCycleError(findCycle(graph, remaining))
  }
}

/**
 * Every node left over by the topological pass has at least one dependency
 * that is also left over, so following dependencies must revisit a node.
 */
function findCycle(graph: ServiceGraph, remaining: Set<string>): string[] {
  const path: string[] = []
  let current = [...remaining][0]

  while (!path.includes(current)) {
    path.push(current)
    const next = [...(graph.get(current) ?? [])].find(dep => remaining.has(dep))
    if (next === undefined) {
      break
    }

    current = next
  }

  return [...path.slice(path.indexOf(current)), current]
}

/** Compute in-degree for each node (number of existing deps). */
function computeInDegree(graph: ServiceGraph): Map<string, number> {
  const inDeg = new Map<string, number>()
  for (const [id, deps] of graph) {
    let count = 0
    for (const dep of deps) {
      if (graph.has(dep)) {
        count++
      }
    }

    inDeg.set(id, count)
  }

  return inDeg
}

/**
 * Return services grouped by topological level (groups that may start concurrently).
 * Services caught in a cycle are left out.
 */
export function topologicalLevels(graph: ServiceGraph): string[][] {
  const inDeg = computeInDegree(graph)
  const levels: string[][] = []
  const remaining = new Set(graph.keys())

  while (remaining.size > 0) {
    const level: string[] = []
    for (const id of remaining) {
      if (inDeg.get(id) === 0) {
        level.push(id)
      }
    }

    if (level.length === 0) {
      break
    }

    levels.push(level)

    for (const id of level) {
      remaining.delete(id)
      for (const [nodeId, deps] of graph) {
        if (deps.has(id) && remaining.has(nodeId)) {
          inDeg.set(nodeId, (inDeg.get(nodeId) ?? 0) - 1)
        }
      }
    }
  }

  return levels
}

/** Total startup order: every service after all of its dependencies. */
export function startupOrder(graph: ServiceGraph): string[] {
  return topologicalLevels(graph).flat()
}

/** Dependents first, so nothing loses a dependency while still running. */
export function shutdownOrder(graph: ServiceGraph): string[] {
  return startupOrder(graph).reverse()
}

/** BFS backward from targets to collect all dependencies + targets. */
export function subgraph(graph: ServiceGraph, targets: string[]): Set<string> {
  const result = new Set<string>()
  const queue = [...targets]

  for (let current = queue.shift(); current !== undefined; current = queue.shift()) {
    if (result.has(current)) {
      continue
    }

    const deps = graph.get(current)
    if (!deps) {
      throw new UnknownReferenceError(undefined, 'service', current)
    }

    result.add(current)
    for (const dep of deps) {
      if (!result.has(dep)) {
        queue.push(dep)
      }
    }
  }

  return result
}
