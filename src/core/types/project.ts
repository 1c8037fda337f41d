import type { FeatureId, TemplateId } from "./common.js";

export interface ProjectRequest {
  readonly projectName: string;
  readonly templateId: TemplateId;
  readonly features: ReadonlySet<FeatureId>;
  readonly targetDir: string;
  /** Replace an existing target directory once the new tree is staged. */
  readonly overwrite: boolean;
  readonly openInEditor: boolean;
  readonly initializeGit: boolean;
}

export interface NewProjectCommandOptions {
  template?: string;
  feature?: string[];
  dir?: string;
  open?: boolean;
  gitInit?: boolean;
  yes?: boolean;
  force?: boolean;
}
