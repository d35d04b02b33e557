/**
 * @fileoverview Annotation adapter exports
 *
 * @module adapters/annotation
 */

export { readAnnotatedDocument, toAnnotationInput } from "./readAnnotatedDocument.js";
