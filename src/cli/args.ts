export type ParsedArgs = {
  positional: string[];
  options: Record<string, string | boolean>;
  repeated: Record<string, string[]>;
};

/**
 * `--chave valor` vira opção com valor; `--chave` sozinha vira flag.
 * Opções repetidas (`--tag a --tag b`) ficam todas em `repeated`.
 */
export function parseOptions(args: string[]): ParsedArgs {
  const positional: string[] = [];
  const options: Record<string, string | boolean> = {};
  const repeated: Record<string, string[]> = {};

  for (let index = 0; index < args.length; index++) {
    const token = args[index];

    if (!token.startsWith('--')) {
      positional.push(token);
      continue;
    }

    const key = token.slice(2);
    const next = args[index + 1];

    if (next === undefined || next.startsWith('--')) {
      options[key] = true;
      continue;
    }

    options[key] = next;
    repeated[key] = [...(repeated[key] ?? []), next];
    index += 1;
  }

  return { positional, options, repeated };
}
