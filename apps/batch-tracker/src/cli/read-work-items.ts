import type { WorkItem } from "../domains/batches/model/batch-service-client.model"
import { UsageError } from "./usage-error"

/** One JSON object per non-blank line. */
export function parseWorkItems(jsonl: string, source: string): WorkItem[] {
  const items: WorkItem[] = []

  for (const [index, line] of jsonl.split("\n").entries()) {
    if (line.trim() === "") continue

    const item = parseLine(line, `${source}:${index + 1}`)
    items.push(item)
  }

  return items
}

function parseLine(line: string, where: string): WorkItem {
  let value: unknown

  try {
    value = JSON.parse(line)
  } catch (err) {
    throw new UsageError(`${where}: not valid JSON`, err)
  }

  if (!isWorkItem(value)) throw new UsageError(`${where}: expected a JSON object`)

  return value
}

function isWorkItem(value: unknown): value is WorkItem {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}
