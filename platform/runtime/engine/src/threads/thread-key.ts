import { DEFAULT_CONVERSATION_ID } from "@switchboard/types";

const CONVERSATION_SEPARATOR = "/";
const PARTICIPANT_SEPARATOR = "~";

export interface ThreadKeyParts {
  conversationId: string;
  initiator: string;
  recipient: string;
}

const encodePart = (part: string): string =>
  encodeURIComponent(part).replace(/~/g, "%7E");

/**
 * Key for the thread opened by `initiator` towards `recipient` within a
 * conversation. Replies travel on the same thread, so `B -> A` only gets
 * its own key when B opens a conversation with A itself.
 * Components are URI-encoded so ids may contain the separators.
 */
export function createThreadKey(
  initiator: string,
  recipient: string,
  conversationId: string = DEFAULT_CONVERSATION_ID,
): string {
  if (initiator === recipient) {
    throw new Error(`A thread needs two distinct participants, got "${initiator}" twice.`);
  }
  if (conversationId.trim() === "") {
    throw new Error("A thread needs a non-empty conversation id.");
  }
  return [
    encodePart(conversationId),
    CONVERSATION_SEPARATOR,
    encodePart(initiator),
    PARTICIPANT_SEPARATOR,
    encodePart(recipient),
  ].join("");
}

export function parseThreadKey(key: string): ThreadKeyParts {
  const malformed = () => new Error(`Malformed thread key "${key}".`);
  const conversationEnd = key.indexOf(CONVERSATION_SEPARATOR);
  const participants = key.slice(conversationEnd + 1).split(PARTICIPANT_SEPARATOR);
  if (conversationEnd <= 0 || participants.length !== 2) {
    throw malformed();
  }

  let decoded: string[];
  try {
    decoded = [key.slice(0, conversationEnd), ...participants].map((part) =>
      decodeURIComponent(part),
    );
  } catch (error) {
    throw new Error(`Malformed thread key "${key}".`, { cause: error });
  }

  const [conversationId, initiator, recipient] = decoded;
  if (!conversationId?.trim() || !initiator || !recipient || initiator === recipient) {
    throw malformed();
  }
  if (createThreadKey(initiator, recipient, conversationId) !== key) {
    throw malformed();
  }

  return { conversationId, initiator, recipient };
}
