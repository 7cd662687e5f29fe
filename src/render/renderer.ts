/**
 * Config Renderer
 *
 * Expands an Intent through its device's Handlebars template into CLI text.
 * Rendering is pure: the same Intent always yields the same bytes.
 */

import fs from "node:fs/promises";
import path from "node:path";

import Handlebars from "handlebars";

import { errorMessage, TemplateError } from "../errors.js";
import type { Intent, PartitionDefinition } from "../types.js";
import { sortNatural } from "../utils/collections.js";

export const TEMPLATE_EXTENSION = ".hbs";

type TemplateFn = (context: Record<string, unknown>) => string;

export class ConfigRenderer {
  private readonly env = Handlebars.create();
  private readonly sources: ReadonlyMap<string, string>;
  private readonly compiled = new Map<string, TemplateFn>();

  /** @param templates template name to Handlebars source, e.g. a Map or `Object.entries(...)` */
  constructor(templates: Iterable<readonly [string, string]>) {
    this.sources = new Map(templates);
    registerHelpers(this.env);
  }

  static async fromDirectory(dir: string): Promise<ConfigRenderer> {
    return new ConfigRenderer(await loadTemplates(dir));
  }

  /**
   * Render one device. Throws TemplateError when the template is missing,
   * malformed, or fails while rendering.
   */
  render(intent: Intent): string {
    const { device } = intent;
    const template = this.template(device.template, device.name);

    let output: string;
    try {
      output = template(buildContext(intent));
    } catch (error) {
      throw new TemplateError(
        `Template "${device.template}" failed for ${device.name}: ${errorMessage(error)}`,
        device.name,
        device.template,
        { cause: error },
      );
    }
    return normalizeOutput(output);
  }

  private template(name: string, device: string): TemplateFn {
    const cached = this.compiled.get(name);
    if (cached) return cached;

    const source = this.sources.get(name);
    if (source === undefined) {
      throw new TemplateError(`Template "${name}" not found`, device, name);
    }

    let fn: TemplateFn;
    try {
      // Parse eagerly; compile() alone defers syntax errors to first use.
      this.env.parse(source);
      fn = this.env.compile(source, { noEscape: true, strict: false });
    } catch (error) {
      throw new TemplateError(`Template "${name}" is invalid: ${errorMessage(error)}`, device, name, {
        cause: error,
      });
    }

    this.compiled.set(name, fn);
    return fn;
  }
}

// =============================================================================
// Context
// =============================================================================

export type RenderedPartition = PartitionDefinition & { rd: string };

/**
 * Build the template context. Collections are sorted so input ordering
 * never changes the output.
 */
export function buildContext(intent: Intent): Record<string, unknown> {
  const { device, globals } = intent;
  const rdBase = device.routerId ?? device.loopback;

  const partitions: RenderedPartition[] = sortNatural(intent.partitions, (p) => p.name).map((p) => ({
    ...p,
    rd: rdBase ? `${rdBase}:${p.rdSuffix}` : p.rdSuffix,
  }));

  return {
    hostname: device.name,
    ...globals,
    name: device.name,
    role: device.role,
    tier: device.tier,
    template: device.template,
    loopback: device.loopback,
    asn: device.asn,
    routerId: device.routerId,
    dependsOn: [...device.dependsOn],
    ...device.attributes,
    interfaces: sortNatural(device.interfaces, (i) => i.name),
    peers: sortNatural(device.peers, (p) => p.address),
    partitions,
  };
}

/**
 * Normalise line endings, strip trailing whitespace, and end with exactly
 * one newline.
 */
export function normalizeOutput(text: string): string {
  const lines = text.replace(/\r\n?/g, "\n").split("\n").map((line) => line.trimEnd());
  while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return `${lines.join("\n")}\n`;
}

function registerHelpers(env: typeof Handlebars): void {
  env.registerHelper("join", (items: unknown, separator: unknown) => {
    if (!Array.isArray(items)) return "";
    return items.map(String).join(typeof separator === "string" ? separator : " ");
  });
  env.registerHelper("eq", (a: unknown, b: unknown) => a === b);
}

// =============================================================================
// Template Loading
// =============================================================================

/**
 * Read every `*.hbs` file in a directory. The template name is the file
 * name without its extension.
 */
export async function loadTemplates(dir: string): Promise<Map<string, string>> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const templates = new Map<string, string>();

  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    if (!entry.isFile() || path.extname(entry.name) !== TEMPLATE_EXTENSION) continue;
    const name = path.basename(entry.name, TEMPLATE_EXTENSION);
    templates.set(name, await fs.readFile(path.join(dir, entry.name), "utf8"));
  }

  return templates;
}
