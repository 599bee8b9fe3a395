// ===========================================
// COUNTRY NAME NORMALISATION
// ===========================================

// Variant spellings found in source datasets and user text -> canonical name
export const COUNTRY_SYNONYMS: Readonly<Record<string, string>> = Object.freeze({
  'USA': 'United States',
  'U.S.': 'United States',
  'U.S.A.': 'United States',
  'United States of America': 'United States',
  'UK': 'United Kingdom',
  'U.K.': 'United Kingdom',
  'Britain': 'United Kingdom',
  'Great Britain': 'United Kingdom',
  'UAE': 'United Arab Emirates',
  'Viet Nam': 'Vietnam',
  'Lao PDR': 'Laos',
  "Lao People's Democratic Republic": 'Laos',
  'Brunei Darussalam': 'Brunei',
  'Czechia': 'Czech Republic',
  'Russian Federation': 'Russia',
  'Korea': 'South Korea',
  'Republic of Korea': 'South Korea',
  'Korea, Republic of': 'South Korea',
  "Democratic People's Republic of Korea": 'North Korea',
  'Iran (Islamic Republic of)': 'Iran',
  'Syrian Arab Republic': 'Syria',
  'Hong Kong, China': 'Hong Kong',
  'Taiwan, China': 'Taiwan',
  'Burma': 'Myanmar',
  'Turkiye': 'Turkey',
  "Cote d'Ivoire": 'Ivory Coast',
  'United Republic of Tanzania': 'Tanzania',
});

const LOWERCASE_SYNONYMS = new Map(
  Object.entries(COUNTRY_SYNONYMS).map(([alias, canonical]): [string, string] => [alias.toLowerCase(), canonical])
);

/**
 * Canonical country name for a raw label. Unknown labels are returned trimmed.
 */
export function canonicalCountry(name: string): string {
  const trimmed = name.trim().replace(/\s+/g, ' ');
  return LOWERCASE_SYNONYMS.get(trimmed.toLowerCase()) ?? trimmed;
}
