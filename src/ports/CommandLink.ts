/**
 * Send capability of one open metadata connection. Valid only while that
 * specific connection instance is open.
 */
export interface CommandTarget {
  readonly connectionId: number;
  isOpen(): boolean;
  send(text: string): Promise<void>;
}
