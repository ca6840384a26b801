/**
 * Run-scoped secret material. Built once per pipeline run from a SecretSource
 * and frozen; only the health gate and the renderer receive it.
 */
export type SecretBundle = Readonly<Record<string, string>>;

export interface SecretSource {
  /** Resolve the named secrets. Names with no value are left out of the bundle. */
  load(names: string[]): Promise<SecretBundle>;
}
