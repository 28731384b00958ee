import { readFile } from 'node:fs/promises'

export type EnvironmentAssignment = {
  name: string
  value: string
  exported: boolean
}

const ASSIGNMENT = /^(?<exported>export )?(?<name>[A-Z_][A-Z0-9_]*)=(?<value>.+)$/

/**
 * Variable assignments made by an environment-setup script. Only top-level
 * `NAME=value` and `export NAME=value` lines are recognised; later
 * assignments to the same name win.
 */
export function parseEnvironmentSetup(content: string): EnvironmentAssignment[] {
  const assignments = new Map<string, EnvironmentAssignment>()

  for (const rawLine of content.split('\n')) {
    const line = rawLine.replace(/\r$/, '')
    const groups = ASSIGNMENT.exec(line)?.groups
    if (!groups?.['name'] || groups['value'] === undefined) continue

    assignments.delete(groups['name'])
    assignments.set(groups['name'], {
      name: groups['name'],
      value: unquote(groups['value']),
      exported: groups['exported'] !== undefined,
    })
  }

  return [...assignments.values()]
}

export async function readEnvironmentSetup(
  scriptPath: string,
): Promise<EnvironmentAssignment[]> {
  return parseEnvironmentSetup(await readFile(scriptPath, 'utf-8'))
}

function unquote(value: string): string {
  const quoted = /^(["'])(.*)\1$/.exec(value)
  return quoted?.[2] ?? value
}
