// Artifact emission.
// Purpose: render the refinement and glue artifacts of a totalized package from one render context.
// Assumes the caller gated on an empty diagnostics list; the emitter does not re-validate.

import type { TotalizedModel } from "../totalize/totalize.js";

import { buildRenderContext, type RenderContextOptions } from "./context.js";
import { renderArtifactTemplate, type ArtifactTemplates } from "./templates.js";

// =============================================================================
// TYPES
// =============================================================================

export type Artifact = {
  fileName: string;
  text: string;
};

export type PackageArtifacts = {
  refinement: Artifact;
  glue: Artifact;
};

export type EmitterOptions = RenderContextOptions;

export type ArtifactEmitter = {
  emit(totalized: TotalizedModel): PackageArtifacts;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createArtifactEmitter(
  templates: ArtifactTemplates,
  options: EmitterOptions = {},
): ArtifactEmitter {
  return {
    emit(totalized) {
      const context = buildRenderContext(totalized, options);
      return {
        refinement: {
          fileName: context.refinementFile,
          text: renderArtifactTemplate("refinement", templates.refinement, context),
        },
        glue: {
          fileName: context.glueFile,
          text: renderArtifactTemplate("glue", templates.glue, context),
        },
      };
    },
  };
}
