import type {
  EditorState,
  KeyBinding,
  ResolvedCommand,
  TransientBinding,
  TransientBindingsAdapter,
} from "./types";
import { debugLog } from "./debug";
import { makeKey } from "./utils";

interface InstalledBindings {
  bindings: ReadonlyMap<string, TransientBinding>;
  keep: (commandId: string) => boolean;
  onExit: () => void;
}

export class KeyMapper<TState extends EditorState>
  implements TransientBindingsAdapter
{
  private countBuffer = "";
  private transient: InstalledBindings | null = null;

  constructor(private keymap: Map<string, KeyBinding<TState>>) {}

  public hasTransientBindings(): boolean {
    return this.transient !== null;
  }

  public installTransientBindings(
    bindings: ReadonlyMap<string, TransientBinding>,
    keep: (commandId: string) => boolean,
    onExit: () => void,
  ): () => void {
    this.exitTransientBindings();
    const installed: InstalledBindings = { bindings, keep, onExit };
    this.transient = installed;
    debugLog("KeyMapper", "transient bindings:", [...bindings.keys()]);
    return () => {
      if (this.transient === installed) this.transient = null;
    };
  }

  public resolve(event: KeyboardEvent): ResolvedCommand<TState> | null {
    if (this.isPureModifier(event.key)) return null;

    const key = makeKey(event);
    if (this.isDigit(key)) {
      this.countBuffer += key;
      return null;
    }

    const transient = this.transient?.bindings.get(key);
    if (transient) {
      const count = this.consumeCountOrOne();
      return {
        id: transient.id,
        command: (_state, invocation) => transient.run(invocation),
        count,
      };
    }

    const binding = this.keymap.get(key);
    if (binding) {
      const count = this.consumeCountOrOne();
      return { id: binding.id, command: binding.command, count };
    }

    this.countBuffer = "";
    return null;
  }

  public preCommand(commandId: string): void {
    if (this.transient && !this.transient.keep(commandId)) {
      this.exitTransientBindings();
    }
  }

  private exitTransientBindings(): void {
    const installed = this.transient;
    if (!installed) return;
    this.transient = null;
    debugLog("KeyMapper", "transient bindings exited");
    installed.onExit();
  }

  private consumeCountOrOne(): number {
    const parsed = this.countBuffer === "" ? NaN : Number(this.countBuffer);
    this.countBuffer = "";
    if (Number.isNaN(parsed)) return 1;
    return Math.min(Math.max(1, parsed), Number.MAX_SAFE_INTEGER);
  }

  private isDigit(key: string): boolean {
    return /^[0-9]$/.test(key);
  }

  private isPureModifier(key: string | undefined): boolean {
    return (
      key === "Shift" || key === "Control" || key === "Alt" || key === "Meta"
    );
  }
}
