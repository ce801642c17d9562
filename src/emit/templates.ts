import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import fse from "fs-extra";
import Handlebars from "handlebars";

import { TemplateError } from "../core/errors.js";

import type { RenderContext } from "./context.js";

// =============================================================================
// TYPES
// =============================================================================

export type ArtifactTemplateName = "refinement" | "glue";

export type ArtifactTemplate = Handlebars.TemplateDelegate<RenderContext>;

export type ArtifactTemplates = Record<ArtifactTemplateName, ArtifactTemplate>;

// =============================================================================
// PUBLIC API
// =============================================================================

const TEMPLATE_NAMES: readonly ArtifactTemplateName[] = ["refinement", "glue"];

/**
 * Read and compile the B artifact templates. This is the only file access
 * emission needs; the compiled templates are then used synchronously.
 */
export async function loadArtifactTemplates(templatesDir?: string): Promise<ArtifactTemplates> {
  const dir = templatesDir ?? resolveTemplatesDir();
  const [refinement, glue] = await Promise.all(
    TEMPLATE_NAMES.map((name) => loadTemplate(dir, name)),
  );
  return { refinement, glue };
}

export function compileArtifactTemplate(
  name: ArtifactTemplateName,
  source: string,
): ArtifactTemplate {
  try {
    return Handlebars.compile<RenderContext>(source, { noEscape: true, strict: true });
  } catch (err) {
    throw new TemplateError(`Artifact template "${name}" failed to compile.`, err);
  }
}

export function renderArtifactTemplate(
  name: ArtifactTemplateName,
  template: ArtifactTemplate,
  context: RenderContext,
): string {
  let output: string;
  try {
    output = template(context);
  } catch (err) {
    throw new TemplateError(`Artifact template "${name}" could not be rendered.`, err);
  }

  if (/\{\{[^}]+\}\}/.test(output)) {
    throw new TemplateError(`Artifact template "${name}" still has unresolved placeholders.`);
  }

  return `${output.trim()}\n`;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function loadTemplate(dir: string, name: ArtifactTemplateName): Promise<ArtifactTemplate> {
  const templatePath = path.join(dir, `${name}.hbs`);

  let raw: string;
  try {
    raw = await fse.readFile(templatePath, "utf8");
  } catch (err) {
    throw new TemplateError(`Failed to read artifact template "${name}" at ${templatePath}.`, err);
  }

  return compileArtifactTemplate(name, raw);
}

function resolveTemplatesDir(): string {
  const packageRoot = findPackageRoot(path.dirname(fileURLToPath(import.meta.url)));
  return path.join(packageRoot, "templates", "b");
}

// Walk upward until package.json so compiled builds under dist/ resolve templates too.
function findPackageRoot(startDir: string): string {
  let current = startDir;

  while (true) {
    if (fs.existsSync(path.join(current, "package.json"))) return current;

    const parent = path.dirname(current);
    if (parent === current) break;

    current = parent;
  }

  throw new TemplateError(`package.json not found while resolving templates from ${startDir}.`);
}
