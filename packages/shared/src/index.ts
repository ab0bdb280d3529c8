// Re-export the rendering helpers and error types shared by both diagram packages.
export { DEFAULT_INDENT, appendSection, indent, render, renderDocument } from './render.js';
export type { DocumentSection, Renderable } from './render.js';

export { DefinitionError, MissingNodeError } from './errors.js';
