/**
 * One physical client connection, seen as whole text frames
 */
export interface TransportSession {
  /** Stable label for logs */
  readonly label: string;
  /** Next frame, or null once the connection is closed */
  receive(): Promise<string | null>;
  /** Rejects when the connection is already closed */
  send(frame: string): Promise<void>;
  close(code?: number, reason?: string): Promise<void>;
}
