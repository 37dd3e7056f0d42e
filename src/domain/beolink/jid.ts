const JID_PATTERN = /^(\d{4})\.(\d{7})\.(\d{8})@products\.bang-olufsen\.com$/;

export function isValidJid(value: string): boolean {
  return JID_PATTERN.test(value);
}

/**
 * Builds a JID from the type number, item number and serial advertised in mDNS TXT records.
 */
export function buildJid(typeNumber: string, itemNumber: string, serial: string): string {
  return `${typeNumber}.${itemNumber}.${serial}@products.bang-olufsen.com`;
}
