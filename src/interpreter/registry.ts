import type {
  Collaborator,
  Directive,
  RunnerConfig,
  Session,
  SourceLoader
} from "../types.js";
import type { Logger } from "../utils/logger.js";
import { expectArgs } from "./args.js";

/**
 * Everything a directive can act on during one run.
 */
export type RunContext = {
  session: Session;
  config: RunnerConfig;
  collaborator: Collaborator;
  sourceLoader: SourceLoader;
  logger: Logger;
  registry: DirectiveRegistry;
  scriptPath?: string; // Absolute path of the running script file
  scriptDirectory?: string; // Script location when the text has no file
  depth: number; // run-script nesting, 0 for the top-level script
  sleep: (ms: number) => Promise<void>;
  onApplied?: (directive: Directive, index: number) => void;
};

export type DirectiveOptions<P> = {
  name: string;
  aliases?: readonly string[];
  summary: string;
  args: readonly string[]; // Accepted named arguments
  maxPositional: number; // Accepted bare tokens, -1 for any number
  parse(directive: Directive): P;
  run(params: P, ctx: RunContext, directive: Directive): Promise<void> | void;
};

export type DirectiveDefinition = {
  readonly name: string;
  readonly aliases: readonly string[];
  readonly summary: string;
  check(directive: Directive): void;
  apply(directive: Directive, ctx: RunContext): Promise<void>;
};

/**
 * Bind a directive's argument parsing to its effect. Arguments are parsed
 * before anything runs, so checkScript and the interpreter reject the same lines.
 */
export function defineDirective<P>(options: DirectiveOptions<P>): DirectiveDefinition {
  const parse = (directive: Directive): P => {
    expectArgs(directive, options.args, options.maxPositional);
    return options.parse(directive);
  };

  return {
    name: options.name,
    aliases: options.aliases ?? [],
    summary: options.summary,
    check(directive) {
      parse(directive);
    },
    async apply(directive, ctx) {
      await options.run(parse(directive), ctx, directive);
    }
  };
}

export interface DirectiveRegistry {
  register(definition: DirectiveDefinition): this;
  resolve(name: string): DirectiveDefinition | undefined;
  list(): DirectiveDefinition[];
}

class DefaultDirectiveRegistry implements DirectiveRegistry {
  private readonly definitions = new Map<string, DirectiveDefinition>();
  private readonly aliases = new Map<string, string>();

  register(definition: DirectiveDefinition): this {
    const name = definition.name.toLowerCase();
    this.definitions.set(name, definition);
    for (const alias of definition.aliases) {
      this.aliases.set(alias.toLowerCase(), name);
    }
    return this;
  }

  resolve(name: string): DirectiveDefinition | undefined {
    const key = name.toLowerCase();
    return this.definitions.get(key) ?? this.definitions.get(this.aliases.get(key) ?? "");
  }

  list(): DirectiveDefinition[] {
    return [...this.definitions.values()];
  }
}

export function createDirectiveRegistry(definitions: readonly DirectiveDefinition[] = []): DirectiveRegistry {
  const registry = new DefaultDirectiveRegistry();
  for (const definition of definitions) {
    registry.register(definition);
  }
  return registry;
}
