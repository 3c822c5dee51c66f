import type { ConnectionStack, DeviceId, StackEntry } from '../types.js';

export const EMPTY_STACK: ConnectionStack = [];

/**
 * Append a device, or move it to the tail if already present.
 * Used both for new connections and for explicit re-activation.
 */
export function pushDevice(stack: ConnectionStack, device: DeviceId, seq: number): ConnectionStack {
  return [...stack.filter((entry) => entry.device !== device), { device, seq }];
}

/** Remove a device. Returns the same stack when the device is absent. */
export function removeDevice(stack: ConnectionStack, device: DeviceId): ConnectionStack {
  if (!containsDevice(stack, device)) {
    return stack;
  }
  return stack.filter((entry) => entry.device !== device);
}

export function containsDevice(stack: ConnectionStack, device: DeviceId): boolean {
  return stack.some((entry) => entry.device === device);
}

/**
 * Most recent entry satisfying `accept`, or null when none does.
 * An empty stack has no fallback.
 */
export function stackTail(
  stack: ConnectionStack,
  accept: (device: DeviceId) => boolean = () => true,
): StackEntry | null {
  for (let i = stack.length - 1; i >= 0; i--) {
    if (accept(stack[i].device)) {
      return stack[i];
    }
  }
  return null;
}

/** Connection sequence of a device, or -1 when it is not in the stack. */
export function sequenceOf(stack: ConnectionStack, device: DeviceId): number {
  const entry = stack.find((e) => e.device === device);
  return entry ? entry.seq : -1;
}
