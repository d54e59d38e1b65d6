/**
 * Minimal session description inspection.
 */

function mediaLines(sdp: string): string[] {
  return sdp.split(/\r?\n/).filter((line) => line.startsWith("m="));
}

/**
 * True when the description carries an `m=<kind>` section.
 */
export function hasMediaSection(sdp: string, kind: string): boolean {
  const prefix = `m=${kind} `;
  return mediaLines(sdp).some((line) => line.startsWith(prefix));
}

/**
 * Number of media sections in the description.
 */
export function countMediaSections(sdp: string): number {
  return mediaLines(sdp).length;
}
