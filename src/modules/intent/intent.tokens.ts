export const INTENT_CHAT_CLIENT = Symbol("INTENT_CHAT_CLIENT");
