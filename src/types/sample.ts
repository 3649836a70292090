export interface Sample {
  id: string;
  fileName: string;
  /** Absolute path of the canonical `.fna` file. */
  path: string;
  annotationDir?: string;
  annotatedAssembly?: string;
}

export interface ManifestEntry {
  sampleId: string;
  path: string;
}
