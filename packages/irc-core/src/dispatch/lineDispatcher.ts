import EventEmitter from "eventemitter3";
import { ParseError } from "../errors";
import { parseIrcMessage } from "../protocol/ircParser";
import type { IrcMessage, LineDispatcherOptions } from "../types";

type DispatcherEvents = {
  message: [message: IrcMessage];
  error: [error: ParseError, line: string];
};

/**
 * Parses already-delimited lines and fans the results out to subscribers.
 * Malformed lines are reported on `error` and never thrown.
 */
export class LineDispatcher {
  private emitter = new EventEmitter<DispatcherEvents>();
  private commandEmitter = new EventEmitter<Record<string, [message: IrcMessage]>>();
  private readonly logger?: (message: string) => void;

  constructor(options: LineDispatcherOptions = {}) {
    this.logger = options.logger;
  }

  onMessage(handler: (message: IrcMessage) => void) {
    this.emitter.on("message", handler);
  }

  onError(handler: (error: ParseError, line: string) => void) {
    this.emitter.on("error", handler);
  }

  onCommand(command: string, handler: (message: IrcMessage) => void) {
    this.commandEmitter.on(command.toUpperCase(), handler);
  }

  dispatch(line: string): IrcMessage | null {
    let message: IrcMessage;
    try {
      message = parseIrcMessage(line);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      this.logger?.(`Dropped malformed line (${error.code}): ${error.message}`);
      this.emitter.emit("error", error, line);
      return null;
    }

    this.emitter.emit("message", message);
    this.commandEmitter.emit(message.command.toUpperCase(), message);
    return message;
  }

  removeAllListeners() {
    this.emitter.removeAllListeners();
    this.commandEmitter.removeAllListeners();
  }
}
