export type Hook<TArgs extends unknown[]> = (...args: TArgs) => void;

export class HookList<TArgs extends unknown[] = []> {
  private hooks: Hook<TArgs>[] = [];

  public add(hook: Hook<TArgs>): () => void {
    this.hooks.push(hook);
    return () => {
      this.remove(hook);
    };
  }

  public remove(hook: Hook<TArgs>): boolean {
    const index = this.hooks.indexOf(hook);
    if (index === -1) return false;
    this.hooks.splice(index, 1);
    return true;
  }

  public size(): number {
    return this.hooks.length;
  }

  public run(...args: TArgs): void {
    for (const hook of [...this.hooks]) {
      hook(...args);
    }
  }
}
