import type { FormBody, Transport } from "../../types/interfaces.js";

export type Method = "GET" | "POST" | "DELETE";

export interface TransportCall {
  method: Method;
  path: string;
  form?: FormBody;
}

type Handler = (call: TransportCall) => unknown;

/** Routes `METHOD path` to canned `data` payloads and records every call. */
export class FakeTransport implements Transport {
  public calls: TransportCall[] = [];
  private readonly routes = new Map<string, Handler>();

  on(method: Method, path: string, handler: Handler): this {
    this.routes.set(`${method} ${path}`, handler);
    return this;
  }

  /** Replies in order; the last reply repeats once the queue is drained. */
  reply(method: Method, path: string, ...replies: unknown[]): this {
    const queue = [...replies];
    return this.on(method, path, () => (queue.length > 1 ? queue.shift() : queue[0]));
  }

  fail(method: Method, path: string, error: Error): this {
    return this.on(method, path, () => {
      throw error;
    });
  }

  callsTo(method: Method, path: string): TransportCall[] {
    return this.calls.filter((c) => c.method === method && c.path === path);
  }

  async get(path: string): Promise<unknown> {
    return this.dispatch({ method: "GET", path });
  }

  async post(path: string, form?: FormBody): Promise<unknown> {
    return this.dispatch({ method: "POST", path, form });
  }

  async delete(path: string): Promise<unknown> {
    return this.dispatch({ method: "DELETE", path });
  }

  private dispatch(call: TransportCall): unknown {
    this.calls.push(call);
    const handler = this.routes.get(`${call.method} ${call.path}`);
    if (!handler) {
      throw new Error(`No fake route for ${call.method} ${call.path}`);
    }
    return handler(call);
  }
}

export const CLUSTER_RESOURCES = [
  { node: "pve1", vmid: 100, name: "web01", type: "qemu", status: "running" },
  { node: "pve2", vmid: 200, name: "100", type: "qemu", status: "stopped" },
  { node: "pve2", vmid: 205, name: "db01", type: "qemu", status: "running" },
  { node: "pve4", vmid: 301, name: "300", type: "qemu", status: "running" },
  { vmid: 400, name: "orphan", type: "qemu" }
];
