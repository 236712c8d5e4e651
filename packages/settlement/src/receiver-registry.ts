import type { PrincipalId } from "@multiledger/types";
import type { ReceiverHook } from "./types.js";

/**
 * Principals that can react to incoming transfer-calls.
 * A receiver without a hook behaves like an unreachable remote.
 */
export class ReceiverRegistry {
  private readonly _hooks = new Map<PrincipalId, ReceiverHook>();

  register(receiverId: PrincipalId, hook: ReceiverHook): void {
    this._hooks.set(receiverId, hook);
  }

  unregister(receiverId: PrincipalId): boolean {
    return this._hooks.delete(receiverId);
  }

  get(receiverId: PrincipalId): ReceiverHook | undefined {
    return this._hooks.get(receiverId);
  }

  has(receiverId: PrincipalId): boolean {
    return this._hooks.has(receiverId);
  }
}
