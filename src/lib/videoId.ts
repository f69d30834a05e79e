// 11-char base64-ish ID (letters, digits, hyphens, underscores)
const VIDEO_ID = /^[\w-]{11}$/;

/**
 * Extract a YouTube video ID from a bare ID or a common URL format.
 *
 * Handles:
 *  - dQw4w9WgXcQ
 *  - youtube.com/watch?v=ID (also m. and music.)
 *  - youtu.be/ID
 *  - youtube.com/embed/ID, /shorts/ID, /live/ID
 *
 * Returns `null` when the input isn't recognised.
 */
export function extractVideoId(input: string): string | null {
  // Shells sometimes leave escapes in pasted IDs (e.g. \-abc)
  const cleaned = input.trim().replace(/\\/g, '');
  if (VIDEO_ID.test(cleaned)) return cleaned;

  try {
    const url = new URL(cleaned.startsWith('http') ? cleaned : `https://${cleaned}`);
    const host = url.hostname.replace(/^(www|m|music)\./, '');

    if (host === 'youtu.be') {
      const id = url.pathname.slice(1).split('/')[0];
      return VIDEO_ID.test(id) ? id : null;
    }

    if (host === 'youtube.com') {
      const v = url.searchParams.get('v');
      if (v && VIDEO_ID.test(v)) return v;

      const match = url.pathname.match(/^\/(?:embed|shorts|live)\/([\w-]{11})(?:[/?]|$)/);
      if (match) return match[1];
    }
  } catch {
    // not a URL
  }

  return null;
}

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}
