import { appendFile, mkdir, stat } from "node:fs/promises"
import { dirname } from "node:path"
import Papa from "papaparse"
import type { HistoryEntry, HistorySink } from "./history.ts"

export const CSV_COLUMNS = ["timestamp", "album", "track", "commentary"] as const

/** Appends one row per play to a CSV file, writing the header only into an empty file. */
export class CsvHistorySink implements HistorySink {
  readonly name = "csv"
  private headerChecked = false

  constructor(private readonly path: string) {}

  async write(entry: HistoryEntry): Promise<void> {
    let text = ""
    if (!this.headerChecked) {
      await mkdir(dirname(this.path), { recursive: true })
      if (await this.isEmpty()) {
        text += `${CSV_COLUMNS.join(",")}\n`
      }
      this.headerChecked = true
    }

    text += `${formatCsvRow(entry)}\n`
    await appendFile(this.path, text, "utf-8")
  }

  private async isEmpty(): Promise<boolean> {
    try {
      return (await stat(this.path)).size === 0
    } catch (error) {
      if (isNotFound(error)) return true
      throw error
    }
  }
}

export function formatCsvRow(entry: HistoryEntry): string {
  return Papa.unparse([CSV_COLUMNS.map((column) => entry[column])], {
    header: false,
    newline: "\n",
  })
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT"
}
