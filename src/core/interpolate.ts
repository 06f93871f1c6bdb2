import {MalformedDescriptorError} from '../errors.js'

export type Variables = Record<string, string | undefined>

const referencePattern = /\$(?:(\$)|\{([^}]*)\}|([a-zA-Z_]\w*))/g
const expressionPattern = /^([a-zA-Z_]\w*)(?:(:?[-?])(.*))?$/s

/**
 * Substitute `${VAR}`, `$VAR`, `${VAR:-default}`, `${VAR-default}`,
 * `${VAR:?message}` and `${VAR?message}`. `$$` yields a literal `$`.
 */
export function interpolate(value: string, variables: Variables, path: string): string {
  return value.replaceAll(referencePattern, (_match, escaped: string | undefined, braced: string | undefined, bare: string | undefined) => {
    if (escaped) {
      return '$'
    }

    if (bare !== undefined) {
      return variables[bare] ?? ''
    }

    const expression = expressionPattern.exec(braced ?? '')
    if (!expression) {
      throw new MalformedDescriptorError(`${path}: invalid interpolation '\${${braced ?? ''}}'`)
    }

    const [, name, operator, operand = ''] = expression
    const current = variables[name]

    switch (operator) {
      case ':-': {
        return current || operand
      }

      case '-': {
        return current ?? operand
      }

      case ':?': {
        if (!current) {
          throw new MalformedDescriptorError(`${path}: ${operand || `variable '${name}' is required`}`)
        }

        return current
      }

      case '?': {
        if (current === undefined) {
          throw new MalformedDescriptorError(`${path}: ${operand || `variable '${name}' is required`}`)
        }

        return current
      }

      default: {
        return current ?? ''
      }
    }
  })
}

/**
 * Interpolate every string scalar of a parsed document. Mapping keys are left untouched.
 */
export function interpolateTree(node: unknown, variables: Variables, path = ''): unknown {
  if (typeof node === 'string') {
    return interpolate(node, variables, path || '<root>')
  }

  if (Array.isArray(node)) {
    return node.map((item: unknown, index) => interpolateTree(item, variables, `${path}[${index}]`))
  }

  if (node !== null && typeof node === 'object') {
    const result: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(node)) {
      result[key] = interpolateTree(value, variables, path ? `${path}.${key}` : key)
    }

    return result
  }

  return node
}
