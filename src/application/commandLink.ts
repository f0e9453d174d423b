import type { CommandTarget } from '@/ports/CommandLink';

/**
 * Holds the send capability of the currently open metadata connection.
 * Written only by the metadata channel; read by the command forwarder.
 */
export class CommandLink {
  private target: CommandTarget | null = null;

  public attach(target: CommandTarget): void {
    this.target = target;
  }

  /** Clears the link if it still points at `target` (or unconditionally when omitted). */
  public detach(target?: CommandTarget): void {
    if (!target || this.target?.connectionId === target.connectionId) {
      this.target = null;
    }
  }

  /** The open target, or null when no connection is usable right now. */
  public current(): CommandTarget | null {
    const target = this.target;
    if (!target || !target.isOpen()) {
      return null;
    }
    return target;
  }
}
