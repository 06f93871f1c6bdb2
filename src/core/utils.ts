import {deburr} from 'lodash-es'

/** Convert a free-form name into a valid project identifier. */
export function slugify(name: string): string {
  return deburr(name)
    .toLowerCase()
    .replaceAll(/[^\w-]/g, '-')
    .replaceAll(/-{2,}/g, '-')
    .replace(/^[-_]+/, '')
    .replace(/-$/, '')
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }

  const seconds = ms / 1000
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`
  }

  const minutes = Math.floor(seconds / 60)
  const remainingSeconds = Math.round(seconds % 60)
  return `${minutes}m ${remainingSeconds}s`
}

/** Runtime name of a project-scoped network or volume. */
export function qualifiedName(project: string, name: string, external: boolean): string {
  return external ? name : `${project}_${name}`
}

/** Runtime container name of a service. */
export function containerName(project: string, service: {name: string; containerName?: string}): string {
  return service.containerName ?? `${project}-${service.name}`
}
