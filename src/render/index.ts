export { ConfigRenderer, buildContext, normalizeOutput, loadTemplates, TEMPLATE_EXTENSION, type RenderedPartition } from "./renderer.js";
