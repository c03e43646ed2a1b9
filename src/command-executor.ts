import type { EditorState, ResolvedCommand } from "./types";
import type { KeyMapper } from "./key-mapper";

export interface CommandHooks {
  beforeCommand(): void;
  afterCommand(): unknown;
}

export class CommandExecutor<TState extends EditorState = EditorState> {
  constructor(
    private state: TState,
    private keyMapper: KeyMapper<TState>,
    private commandHooks: CommandHooks,
  ) {}

  public run(resolved: ResolvedCommand<TState>, event: KeyboardEvent | null) {
    this.keyMapper.preCommand(resolved.id);
    this.commandHooks.beforeCommand();
    try {
      resolved.command(this.state, { event, count: resolved.count });
    } finally {
      this.commandHooks.afterCommand();
    }
  }
}
