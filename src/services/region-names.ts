import { NamedEntry } from "./prefix-table";

export interface RegionName {
  name: string;
  short: string;
}

const PROVINCE_SUFFIXES = ["省", "市", "自治区", "特别行政区"];
const CITY_SUFFIXES = ["市", "州", "盟", "地区", "区", "县"];

// Stripped wherever they appear when deriving a short name
const SHORT_NAME_NOISE = [
  "特别行政区",
  "自治区",
  "维吾尔",
  "壮族",
  "回族",
  "省",
  "市",
];

const MUNICIPALITIES = ["北京", "上海", "天津", "重庆"];
const KEPT_WHOLE = [...MUNICIPALITIES, "香港", "澳门"];

/**
 * Pick the first available localized name in preference order
 */
export function pickName(
  names: Record<string, string>,
  languages: string[]
): { name: string; language: string } | null {
  for (const language of languages) {
    const name = names[language];
    if (name) return { name, language };
  }
  return null;
}

/**
 * Two-character abbreviation of a Chinese administrative name
 * Example: "广东省" -> "广东", "内蒙古自治区" -> "内蒙"
 */
export function shortRegionName(name: string): string {
  let stripped = name.trim();
  for (const noise of SHORT_NAME_NOISE) {
    stripped = stripped.split(noise).join("");
  }

  if (KEPT_WHOLE.includes(stripped)) return stripped;

  const chars = Array.from(stripped);
  return chars.length <= 2 ? stripped : chars.slice(0, 2).join("");
}

function withSuffix(name: string, suffixes: string[], fallback: string): string {
  return suffixes.some((suffix) => name.endsWith(suffix))
    ? name
    : `${name}${fallback}`;
}

function isChinese(language: string): boolean {
  return language.toLowerCase().startsWith("zh");
}

/**
 * Display and short names for a subdivision of the global city table.
 * Chinese names get their administrative suffix (市 for municipalities,
 * else 省); other languages use the subdivision's ISO code as the short form.
 */
export function describeSubdivision(
  entry: NamedEntry,
  languages: string[]
): RegionName | null {
  const picked = pickName(entry.names, languages);
  if (!picked) return null;
  if (isChinese(picked.language)) {
    return {
      name: withSuffix(
        picked.name,
        PROVINCE_SUFFIXES,
        MUNICIPALITIES.includes(picked.name) ? "市" : "省"
      ),
      short: shortRegionName(picked.name),
    };
  }
  return { name: picked.name, short: entry.isoCode ?? picked.name };
}

export function describeCity(
  entry: NamedEntry,
  languages: string[]
): RegionName | null {
  const picked = pickName(entry.names, languages);
  if (!picked) return null;
  if (isChinese(picked.language)) {
    return {
      name: withSuffix(picked.name, CITY_SUFFIXES, "市"),
      short: shortRegionName(picked.name),
    };
  }
  return { name: picked.name, short: picked.name };
}
