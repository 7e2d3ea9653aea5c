// @agent-studio/schemas — shared Zod schemas and inferred types

export * from "./agent.js";
export * from "./message.js";
export * from "./session.js";
export * from "./protocol.js";
export * from "./api.js";
