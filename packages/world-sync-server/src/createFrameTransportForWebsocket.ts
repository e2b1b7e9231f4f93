import WebSocket from "ws";

import { FrameTransport, InboundFrame, OutboundFrame } from "./FrameTransport";

export type WebsocketFrameTransportOptions = {
  // Largest inbound message accepted, in bytes (default: 1024)
  maxMessageSize?: number;
  // Unread inbound frames buffered before the socket is paused (default: 256)
  maxPendingInboundFrames?: number;
};

const POLICY_VIOLATION_CLOSE_CODE = 1008;

function toUint8Array(data: WebSocket.RawData): Uint8Array {
  if (Array.isArray(data)) {
    return new Uint8Array(Buffer.concat(data));
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * Adapts a `ws` socket to a FrameTransport. Messages arriving before they are
 * read are queued. The socket is paused while the queue is full and resumed
 * once it has room again; an oversized message closes it with 1008.
 */
export class WebsocketFrameTransport implements FrameTransport {
  private inboundFrames: Array<InboundFrame> = [];
  private pendingRead: {
    resolve: (frame: InboundFrame) => void;
    reject: (error: Error) => void;
  } | null = null;
  private terminalFrame: InboundFrame | null = null;
  private terminalError: Error | null = null;

  private maxMessageSize: number;
  private maxPendingInboundFrames: number;

  constructor(
    public readonly webSocket: WebSocket,
    opts: WebsocketFrameTransportOptions = {},
  ) {
    this.maxMessageSize = opts.maxMessageSize ?? 1024;
    this.maxPendingInboundFrames = opts.maxPendingInboundFrames ?? 256;

    webSocket.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      this.handleMessage(data, isBinary);
    });
    webSocket.on("close", () => {
      this.finish({ opcode: "close" }, null);
    });
    webSocket.on("error", (error: Error) => {
      this.finish(null, error);
    });
  }

  public readFrame(): Promise<InboundFrame> {
    if (this.pendingRead !== null) {
      return Promise.reject(new Error("readFrame called while a read is already pending"));
    }
    const frame = this.inboundFrames.shift();
    if (frame !== undefined) {
      if (this.webSocket.isPaused && this.inboundFrames.length < this.maxPendingInboundFrames) {
        // May deliver buffered messages synchronously, behind the frame taken above
        this.webSocket.resume();
      }
      return Promise.resolve(frame);
    }
    if (this.terminalError !== null) {
      return Promise.reject(this.terminalError);
    }
    if (this.terminalFrame !== null) {
      return Promise.resolve(this.terminalFrame);
    }
    return new Promise<InboundFrame>((resolve, reject) => {
      this.pendingRead = { resolve, reject };
    });
  }

  public writeFrame(frame: OutboundFrame): Promise<void> {
    if (this.webSocket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error("WebSocket is not open"));
    }
    return new Promise<void>((resolve, reject) => {
      this.webSocket.send(frame.payload, { binary: frame.opcode === "binary" }, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  public close(code?: number, reason?: string) {
    if (
      this.webSocket.readyState === WebSocket.CLOSING ||
      this.webSocket.readyState === WebSocket.CLOSED
    ) {
      return;
    }
    this.webSocket.close(code, reason);
  }

  private handleMessage(data: WebSocket.RawData, isBinary: boolean) {
    if (this.terminalFrame !== null || this.terminalError !== null) {
      return;
    }
    const bytes = toUint8Array(data);
    if (bytes.byteLength > this.maxMessageSize) {
      this.close(
        POLICY_VIOLATION_CLOSE_CODE,
        `Message size ${bytes.byteLength} bytes exceeds maximum allowed size of ${this.maxMessageSize} bytes`,
      );
      this.finish({ opcode: "close" }, null);
      return;
    }
    const frame: InboundFrame = isBinary
      ? { opcode: "binary", payload: bytes }
      : { opcode: "text", payload: Buffer.from(bytes).toString("utf8") };

    if (this.pendingRead !== null) {
      const { resolve } = this.pendingRead;
      this.pendingRead = null;
      resolve(frame);
      return;
    }
    this.inboundFrames.push(frame);
    if (this.inboundFrames.length >= this.maxPendingInboundFrames && !this.webSocket.isPaused) {
      this.webSocket.pause();
    }
  }

  // Frames queued before the socket ended are still delivered first
  private finish(frame: InboundFrame | null, error: Error | null) {
    if (this.terminalFrame !== null || this.terminalError !== null) {
      return;
    }
    this.terminalFrame = frame;
    this.terminalError = error;
    if (this.pendingRead !== null) {
      const { resolve, reject } = this.pendingRead;
      this.pendingRead = null;
      if (error !== null) {
        reject(error);
      } else if (frame !== null) {
        resolve(frame);
      }
    }
  }
}

export function createFrameTransportForWebsocket(
  webSocket: WebSocket,
  opts: WebsocketFrameTransportOptions = {},
): FrameTransport {
  return new WebsocketFrameTransport(webSocket, opts);
}
