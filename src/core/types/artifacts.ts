export interface FileArtifact {
  path: string;
  content: string;
}
