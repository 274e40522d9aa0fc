/**
 * Skill Service
 *
 * Named functions grouped into plugins, invoked by workers with a record of
 * named arguments. A single service instance is handed to the worker
 * manager at orchestrator construction and threaded into every worker.
 *
 * @module execution/skills/skill-service
 */

export type SkillArguments = Record<string, unknown>;

export type SkillFunction = (args: SkillArguments) => unknown;

export interface SkillDescriptor {
  plugin: string;
  name: string;
}

export interface SkillService {
  /**
   * Invoke `plugin.functionName` with named arguments.
   *
   * Rejects with SkillNotFoundError for an unknown plugin or function, and
   * with whatever the function throws otherwise. Callers (workers) handle
   * the rejection.
   */
  invoke(plugin: string, functionName: string, args?: SkillArguments): Promise<unknown>;
  has(plugin: string, functionName: string): boolean;
  list(): SkillDescriptor[];
}

export class SkillNotFoundError extends Error {
  readonly plugin: string;
  readonly functionName: string;

  constructor(plugin: string, functionName: string) {
    super(`Skill '${plugin}.${functionName}' is not registered`);
    this.name = "SkillNotFoundError";
    this.plugin = plugin;
    this.functionName = functionName;
  }
}

/**
 * In-process skill service backed by plain functions.
 */
export class NativeSkillService implements SkillService {
  private readonly plugins = new Map<string, Map<string, SkillFunction>>();

  /**
   * Register (or extend) a plugin. Re-registering a function name replaces it.
   */
  register(plugin: string, functions: Record<string, SkillFunction>): this {
    const existing = this.plugins.get(plugin) ?? new Map<string, SkillFunction>();
    for (const [name, fn] of Object.entries(functions)) {
      existing.set(name, fn);
    }
    this.plugins.set(plugin, existing);
    return this;
  }

  has(plugin: string, functionName: string): boolean {
    return this.plugins.get(plugin)?.has(functionName) ?? false;
  }

  list(): SkillDescriptor[] {
    const skills: SkillDescriptor[] = [];
    for (const [plugin, functions] of this.plugins) {
      for (const name of functions.keys()) {
        skills.push({ plugin, name });
      }
    }
    return skills;
  }

  async invoke(
    plugin: string,
    functionName: string,
    args: SkillArguments = {}
  ): Promise<unknown> {
    const fn = this.plugins.get(plugin)?.get(functionName);
    if (!fn) {
      throw new SkillNotFoundError(plugin, functionName);
    }
    return fn(args);
  }
}
