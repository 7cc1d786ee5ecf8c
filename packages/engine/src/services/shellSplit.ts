/**
 * Splits a command line into argv the way a POSIX shell would for plain words:
 * whitespace separates words, single quotes are literal, double quotes allow
 * `\"` and `\\` escapes, and a backslash outside quotes escapes the next char.
 * No expansion of any kind is performed.
 */
export function shellSplit(command: string): string[] {
  const args: string[] = [];
  let current = "";
  let inWord = false;
  let quote: "'" | "\"" | null = null;

  for (let i = 0; i < command.length; i++) {
    const ch = command.charAt(i);

    if (quote === "'") {
      if (ch === "'") quote = null;
      else current += ch;
      continue;
    }

    if (quote === "\"") {
      if (ch === "\"") {
        quote = null;
      } else if (ch === "\\" && (command[i + 1] === "\"" || command[i + 1] === "\\")) {
        current += command.charAt(++i);
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === "\\") {
      if (i + 1 < command.length) current += command.charAt(++i);
      inWord = true;
      continue;
    }

    if (ch === "'" || ch === "\"") {
      quote = ch;
      inWord = true;
      continue;
    }

    if (/\s/.test(ch)) {
      if (inWord) args.push(current);
      current = "";
      inWord = false;
      continue;
    }

    current += ch;
    inWord = true;
  }

  if (quote) throw new Error(`Unterminated ${quote === "'" ? "single" : "double"} quote in: ${command}`);
  if (inWord) args.push(current);
  return args;
}
