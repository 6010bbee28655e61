import { randomUUID } from "node:crypto";

/** Random request identifier (UUIDv4). */
export const generateId = (): string => randomUUID();
