export * from "./graph/types.js";
export * from "./graph/errors.js";
export { AttributeBagSchema, AttributeValueSchema, parseAttributeBag } from "./graph/attributes.js";
export * from "./graph/registry.js";
export * from "./graph/source.js";
export * from "./options/physics.js";
export * from "./options/networkOptions.js";
export * from "./config/display.js";
export * from "./export/html.js";
export * from "./export/writer.js";
export * from "./logger.js";
export * from "./network.js";
