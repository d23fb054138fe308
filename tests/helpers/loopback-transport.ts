import type { Frame } from "../../src/common/types.js";
import type { FrameTransport } from "../../src/session/types.js";

class FrameQueue {
  private readonly frames: Frame[] = [];
  private readonly waiters: Array<(frame: Frame) => void> = [];

  push(frame: Frame): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(frame);
    } else {
      this.frames.push(frame);
    }
  }

  shift(): Promise<Frame> {
    const frame = this.frames.shift();
    if (frame) {
      return Promise.resolve(frame);
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }
}

/**
 * Two connected in-memory transports: frames sent on one side arrive on the
 * other in order.
 */
export function createLoopbackPair(): {
  ate: FrameTransport;
  dut: FrameTransport;
} {
  const toDut = new FrameQueue();
  const toAte = new FrameQueue();
  return {
    ate: {
      sendFrame: async (frame) => toDut.push(frame),
      receiveFrame: () => toAte.shift(),
    },
    dut: {
      sendFrame: async (frame) => toAte.push(frame),
      receiveFrame: () => toDut.shift(),
    },
  };
}

/**
 * Replays a fixed list of incoming frames and records outgoing ones. Running
 * out of frames rejects, standing in for a transport timeout.
 */
export class ScriptedTransport implements FrameTransport {
  readonly sent: Frame[] = [];

  constructor(private readonly incoming: Frame[]) {}

  async sendFrame(frame: Frame): Promise<void> {
    this.sent.push(frame);
  }

  async receiveFrame(): Promise<Frame> {
    const frame = this.incoming.shift();
    if (!frame) {
      throw new Error("no more frames");
    }
    return frame;
  }
}
