/**
 * Keyword sets for sensitivity filtering and intent classification.
 *
 * All entries are lower-case and matched as substrings of the lower-cased
 * query. Accented and unaccented spellings are both listed.
 */

export const SENSITIVE_TERMS: readonly string[] = [
  'contrasena',
  'contraseña',
  'password',
  'tarjeta',
  'banco',
  'ssn',
  'seguro social',
];

export type KeywordIntent = 'medical_advice' | 'emotional_support' | 'health_analysis' | 'reminder';

export type RoutingKeywords = Readonly<Record<KeywordIntent, readonly string[]>>;

/**
 * Checked in this order; the first set with a hit wins.
 */
export const KEYWORD_PRIORITY: readonly KeywordIntent[] = [
  'medical_advice',
  'emotional_support',
  'health_analysis',
  'reminder',
];

export const DEFAULT_ROUTING_KEYWORDS: RoutingKeywords = {
  medical_advice: [
    'debo tomar',
    'es seguro',
    'efecto secundario',
    'interaccion',
    'interacción',
    'sintoma',
    'síntoma',
    'doctor',
    'medicina',
    'tratamiento',
    'enfermedad',
  ],
  emotional_support: [
    'siento',
    'ansioso',
    'ansiosa',
    'ansiedad',
    'preocupado',
    'preocupada',
    'miedo',
    'solo',
    'ayudame',
    'ayúdame',
    'estresado',
    'triste',
    'deprimido',
  ],
  health_analysis: ['tendencia', 'promedio', 'historial', 'comparar', 'analizar'],
  reminder: ['recordar', 'cuando', 'cuándo', 'proxima', 'próxima', 'horario', 'cita'],
};

/**
 * Merges per-intent overrides onto the defaults. An override replaces the
 * whole set for that intent.
 */
export function mergeKeywords(overrides?: Partial<RoutingKeywords>): RoutingKeywords {
  if (!overrides) {
    return DEFAULT_ROUTING_KEYWORDS;
  }
  return { ...DEFAULT_ROUTING_KEYWORDS, ...overrides };
}
