/**
 * The runtime key of a message: the class it was constructed from.
 * Abstract classes are accepted so handlers can be registered against a base type.
 * @template T The instance type the class produces
 */
export type MessageType<T = unknown> = abstract new (...args: never[]) => T;

/**
 * Checks whether a value can serve as a message type key.
 * @param value The value to check
 */
export function isMessageType(value: unknown): value is MessageType {
  return typeof value === "function";
}

/**
 * Gets the message type of a message instance.
 * @param message The message
 * @returns The constructor the message was created with
 */
export function messageTypeOf(message: object): MessageType {
  const type: unknown = message.constructor;
  if (!isMessageType(type)) {
    throw new TypeError("Message has no constructor to dispatch on.");
  }
  return type;
}

/**
 * Gets a readable name for a message type, used in logs and error messages.
 */
export function messageTypeName(type: MessageType): string {
  return type.name || "<anonymous>";
}
