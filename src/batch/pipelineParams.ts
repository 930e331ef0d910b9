import { ValidationError } from "../core/errors.js";
import type { JobDescriptor, ScalarParam } from "../core/job.js";

export type PipelineParams = Record<string, ScalarParam>;

interface PipelinePreset {
  params(descriptor: JobDescriptor): PipelineParams;
  requiresTargetBed?: boolean;
}

const PRESETS: Record<string, PipelinePreset> = {
  "dragen-germline": {
    params: () => ({
      "enable-map-align": true,
      "enable-sort": true,
      "enable-duplicate-marking": true,
      "enable-variant-caller": true
    })
  },
  "dragen-rna": {
    params: (d) => ({
      "enable-rna": true,
      "enable-rna-quantification": true,
      "annotation-file": `/reference-data/${d.reference}/genes.gtf`
    })
  },
  "dragen-enrichment": {
    requiresTargetBed: true,
    params: (d) => ({
      "enable-map-align": true,
      "enable-variant-caller": true,
      "vc-target-bed": d.targetBed ?? "",
      "vc-target-bed-padding": 100
    })
  }
};

export function requiresTargetBed(pipeline: string): boolean {
  return PRESETS[pipeline]?.requiresTargetBed === true;
}

export function knownPipelines(): string[] {
  return Object.keys(PRESETS).sort();
}

/**
 * Launch parameters for one sample: common reference/output settings, then the
 * pipeline preset (if any), then the sample's custom_params, later keys winning.
 */
export function buildPipelineParams(descriptor: JobDescriptor): PipelineParams {
  const preset = PRESETS[descriptor.pipeline];
  if (requiresTargetBed(descriptor.pipeline) && !descriptor.targetBed) {
    throw new ValidationError("InvalidParameter", `pipeline ${descriptor.pipeline} requires target_bed`);
  }

  const params: PipelineParams = {
    "sample-id": descriptor.sampleId,
    "reference-tar": `/reference-data/${descriptor.reference}/${descriptor.reference}.fa`,
    "output-directory": "/output",
    ...(preset ? preset.params(descriptor) : {})
  };
  if (!preset && descriptor.targetBed) params["vc-target-bed"] = descriptor.targetBed;

  return { ...params, ...descriptor.customParams };
}
