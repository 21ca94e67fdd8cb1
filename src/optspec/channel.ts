/** Where diagnostic lines go. One call per line, without the trailing newline. */
export interface ErrorChannel {
  write(line: string): void
}

export const stderrChannel: ErrorChannel = {
  write: line => {
    process.stderr.write(`${line}\n`)
  }
}

export const silentChannel: ErrorChannel = {
  write: () => {}
}

export interface CollectingChannel extends ErrorChannel {
  readonly lines: readonly string[]
}

export function collectingChannel(): CollectingChannel {
  const lines: string[] = []
  return {
    lines,
    write: line => {
      lines.push(line)
    }
  }
}
