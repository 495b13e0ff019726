const ENTITIES: Record<string, string> = {
  "&lt;": "<",
  "&gt;": ">",
  "&amp;": "&",
  "&quot;": '"',
  "&apos;": "'",
};

/**
 * Drops SSML tags and decodes the five predefined XML entities. The engine
 * reads plain text only.
 */
export const stripSsml = (data: string): string =>
  data.replace(/<[^>]*>?/g, "").replace(/&(?:lt|gt|amp|quot|apos);/g, (m) => ENTITIES[m] ?? m);
