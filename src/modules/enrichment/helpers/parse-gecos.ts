/**
 * src/modules/enrichment/helpers/parse-gecos.ts
 *
 * GECOS is "Full Name,Room,Work Phone,Home Phone,Email" on this cluster.
 */

export const GECOS_NAME_INDEX = 0;
export const GECOS_EMAIL_INDEX = 4;

/** Trimmed field at `index`, or undefined when absent or blank. */
export function gecosField(gecos: string, index: number): string | undefined {
  const value = gecos.split(',')[index]?.trim();
  return value ? value : undefined;
}
