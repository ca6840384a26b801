/** Rendered cluster manifests. */
export type ManifestDocument = {
  apiVersion: string;
  kind: string;
  metadata: {
    name: string;
    namespace?: string;
    labels?: Record<string, string>;
    annotations?: Record<string, string>;
  };
  [key: string]: unknown;
};

export type Manifest = {
  kind: string;
  name: string;
  /** Assigned once the set is ordered: NN-<kind>-<name>.yaml */
  fileName: string;
  /** Service the template was bound to, if any. */
  service?: string;
  /** Template file the document came from; absent for the generated Secret. */
  source?: string;
  content: string;
  document: ManifestDocument;
};

export type ManifestSet = {
  manifests: Manifest[];
};

export type ValidatedManifestSet = ManifestSet & { readonly validated: true };

export type Artifact = {
  path: string;
  rootDir: string;
  archiveName: string;
  members: string[];
  sha256: string;
  bytes: number;
};

export type PublishAck = {
  remotePath: string;
  bytes: number;
  publishedAt: string;
};
