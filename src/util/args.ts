const isWs = (c: string): boolean =>
  c === " " || c === "\t" || c === "\n" || c === "\r";

/** Splits a flag string the way a shell would, honouring single and double quotes. */
export function parseStringToArgs(rawArgs: string): string[] {
  if (!rawArgs || typeof rawArgs !== "string") {
    return [];
  }

  const args: string[] = [];
  let idx = 0;

  const skipWs = (): void => {
    while (idx < rawArgs.length && isWs(rawArgs[idx])) {
      idx += 1;
    }
  };

  const readValue = (): string | null => {
    skipWs();

    if (idx >= rawArgs.length) {
      return null;
    }

    let value = "";
    while (idx < rawArgs.length && !isWs(rawArgs[idx])) {
      const quoteChar =
        rawArgs[idx] === '"' || rawArgs[idx] === "'" ? rawArgs[idx] : null;
      if (quoteChar) {
        idx += 1;
        while (idx < rawArgs.length && rawArgs[idx] !== quoteChar) {
          value += rawArgs[idx];
          idx += 1;
        }
        // closing quote
        idx += 1;
      } else {
        value += rawArgs[idx];
        idx += 1;
      }
    }

    return value;
  };

  while (idx < rawArgs.length) {
    const value = readValue();
    if (value != null) {
      args.push(value);
    }
  }

  return args;
}
