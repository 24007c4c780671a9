import { existsSync, readFileSync, writeFileSync } from 'node:fs'

/**
 * Where version-declaration text comes from
 */
export interface TextSource {
  read: (path: string) => string
}

/**
 * Where the rendered descriptor goes
 */
export interface TextSink {
  write: (path: string, content: string) => void
}

export const fileSource: TextSource = {
  read(path: string): string {
    if (!existsSync(path)) {
      throw new Error(`Version file not found: ${path}`)
    }

    try {
      return readFileSync(path, 'utf-8')
    }
    catch (error) {
      throw new Error(`Failed to read ${path}: ${error}`)
    }
  },
}

export const fileSink: TextSink = {
  write(path: string, content: string): void {
    try {
      writeFileSync(path, content, 'utf-8')
    }
    catch (error) {
      throw new Error(`Failed to write ${path}: ${error}`)
    }
  },
}

/**
 * In-memory store acting as both source and sink
 */
export class MemoryFiles implements TextSource, TextSink {
  readonly files: Map<string, string>

  constructor(initial: Record<string, string> = {}) {
    this.files = new Map(Object.entries(initial))
  }

  read(path: string): string {
    const content = this.files.get(path)
    if (content === undefined) {
      throw new Error(`Version file not found: ${path}`)
    }
    return content
  }

  write(path: string, content: string): void {
    this.files.set(path, content)
  }

  has(path: string): boolean {
    return this.files.has(path)
  }
}
