// src/core/storage/playlist.ts

function isSegmentLine(line: string): boolean {
  return line.length > 0 && !line.startsWith('#') && (line.endsWith('.ts') || line.includes('/ts?'));
}

/**
 * Rewrites relative segment references in an HLS playlist to absolute URLs
 * resolved against the playlist's own location, so the copy keeps streaming
 * segments from the origin. Tags, comments and other lines pass through.
 */
export function absolutizeSegments(playlist: string, playlistUrl: string): string {
  return playlist
    .split('\n')
    .map((line) => {
      const stripped = line.trim();
      if (!isSegmentLine(stripped)) {
        return line;
      }
      if (stripped.startsWith('http')) {
        return stripped;
      }
      return new URL(stripped, playlistUrl).toString();
    })
    .join('\n');
}
