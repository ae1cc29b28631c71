export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

export interface CommandIO {
  out(line: string): void
  err(line: string): void
}

export const consoleIO: CommandIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
}
