import type { ScenarioStatus } from "../core/status-store.js";
import type { Logger } from "../logger.js";
import type { StatusOutput } from "../outputs/output.js";
import { parseClientEvent } from "./protocol.js";
import type { ClientEvent, ServerEvent } from "./protocol.js";

export type Reply = (event: ServerEvent) => void;
type EventHandler = (event: ClientEvent, reply: Reply) => void;

export type WebSocketLike = {
  OPEN: number;
  readyState: number;
  send: (payload: string) => void;
  on: (event: "message" | "close", listener: (data: unknown) => void) => void;
};

export class WsHub implements StatusOutput {
  readonly id = "ws";
  private sockets = new Set<WebSocketLike>();

  constructor(private readonly logger: Logger) {}

  get size(): number {
    return this.sockets.size;
  }

  addClient(socket: WebSocketLike, onEvent: EventHandler): void {
    this.sockets.add(socket);
    this.logger.debug({ clients: this.sockets.size }, "WebSocket client added");
    const reply: Reply = (event) => this.send(socket, event);

    socket.on("message", (raw: unknown) => {
      const event = parseClientEvent(String(raw));
      if (!event) {
        this.logger.debug({ raw: String(raw) }, "Ignoring malformed client event");
        return;
      }
      onEvent(event, reply);
    });

    socket.on("close", () => {
      this.sockets.delete(socket);
      this.logger.debug({ clients: this.sockets.size }, "WebSocket client closed");
    });
  }

  send(socket: WebSocketLike, event: ServerEvent): void {
    if (socket.readyState === socket.OPEN) {
      socket.send(JSON.stringify(event));
    }
  }

  broadcast(event: ServerEvent): void {
    const payload = JSON.stringify(event);
    for (const socket of this.sockets) {
      if (socket.readyState === socket.OPEN) {
        socket.send(payload);
      }
    }
  }

  push(status: ScenarioStatus): void {
    this.broadcast({ type: "status", payload: status });
  }
}
