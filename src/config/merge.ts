export type ConfigObject = Record<string, unknown>

export function isConfigObject(value: unknown): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Deep merge two config layers. Source values override target values.
 * Arrays are replaced, not merged; undefined values in source are ignored.
 */
export function deepMerge(target: ConfigObject, source: ConfigObject): ConfigObject {
  const result: ConfigObject = { ...target }

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) continue

    const targetValue = result[key]
    result[key] =
      isConfigObject(sourceValue) && isConfigObject(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue
  }

  return result
}

/**
 * Set a value at a dot-separated path, creating intermediate objects.
 */
export function setPath(obj: ConfigObject, path: string, value: unknown): void {
  const parts = path.split('.')
  const last = parts.pop()
  if (last === undefined || last === '') return

  let current = obj
  for (const part of parts) {
    const next = current[part]
    if (isConfigObject(next)) {
      current = next
    } else {
      const created: ConfigObject = {}
      current[part] = created
      current = created
    }
  }

  current[last] = value
}
