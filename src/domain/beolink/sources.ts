/** Sources a device can request when joining a peer's Beolink experience. */
export const BEOLINK_JOIN_SOURCES = [
  'beoradio',
  'deezer',
  'spotify',
  'tidal',
  'radio',
  'tp1',
  'tp2',
  'cd',
  'aux_a',
  'ph',
] as const;

/** Beolink Converter NL/ML sources, which the device expects upper-cased. */
const UPPER_CASE_SOURCES: readonly string[] = ['aux_a', 'cd', 'ph', 'radio', 'tp1', 'tp2'];

export type BeolinkJoinSource = (typeof BEOLINK_JOIN_SOURCES)[number];

export function isBeolinkJoinSource(value: string): value is BeolinkJoinSource {
  return BEOLINK_JOIN_SOURCES.some((source) => source === value);
}

export function joinSourceForRequest(source: BeolinkJoinSource): string {
  return UPPER_CASE_SOURCES.includes(source) ? source.toUpperCase() : source;
}
