import { DailySummary } from '../src/utils/aggregation.js';
import { Verdict, verdictCssClass } from '../src/utils/scoring.js';
import {
  buildRecommendations,
  buildSubjectLine,
  buildTextDigest,
  formatLongDateFr,
  formatShortDateFr,
} from '../src/utils/digest.js';

const SPOT = 'La Couarde-sur-Mer';
const TODAY = '2025-06-14';

const daySummary = (
  date: string,
  dailyScore: number,
  verdict: Verdict,
  overrides: Partial<DailySummary> = {},
): DailySummary => ({
  date,
  dailyScore,
  verdict,
  cssClass: verdictCssClass(verdict),
  bestWindow: '–',
  avgWindKts: null,
  maxGustKts: null,
  avgWaveM: null,
  avgWavePeriodS: null,
  maxRainMmh: null,
  avgTempC: null,
  windDir: null,
  windDirArrow: '?',
  windDirName: '–',
  limitingFactor: 'wind',
  limitingFactorLabel: 'vent fort',
  ...overrides,
});

test('French date formats', () => {
  expect(formatShortDateFr('2025-06-14')).toBe('Sam. 14/06');
  expect(formatShortDateFr('2025-06-16')).toBe('Lun. 16/06');
  expect(formatLongDateFr('2025-06-14')).toBe('Samedi 14 Juin 2025');
  expect(formatLongDateFr('2025-08-03')).toBe('Dimanche 3 Août 2025');
  expect(formatShortDateFr('soon')).toBe('soon');
});

test('buildSubjectLine carries today score and verdict', () => {
  const summaries = [daySummary(TODAY, 72.5, 'Excellent')];
  expect(buildSubjectLine({ spotName: SPOT, today: TODAY, summaries })).toBe(
    '🎣 Pêche Kayak — La Couarde-sur-Mer — 14/06 — Score: 72/100 — Excellent',
  );
  expect(buildSubjectLine({ spotName: SPOT, today: TODAY, summaries: [daySummary(TODAY, 12, 'Déconseillé')] })).toBe(
    '❌ Pêche Kayak — La Couarde-sur-Mer — 14/06 — Score: 12/100 — Déconseillé',
  );
});

test('buildSubjectLine falls back to the full date without a summary for today', () => {
  expect(buildSubjectLine({ spotName: SPOT, today: TODAY, summaries: [] })).toBe(
    '📊 Pêche Kayak — La Couarde-sur-Mer — 14/06/2025',
  );
});

test('buildRecommendations lists good days, the best day and days to avoid', () => {
  const summaries = [
    daySummary(TODAY, 80, 'Excellent'),
    daySummary('2025-06-15', 60, 'Favorable'),
    daySummary('2025-06-16', 78, 'Excellent', { bestWindow: '07h–09h' }),
    daySummary('2025-06-17', 20, 'Déconseillé', { limitingFactorLabel: 'vent fort' }),
    daySummary('2025-06-18', 85, 'Excellent'),
    daySummary('2025-06-19', 25, 'Déconseillé', { limitingFactorLabel: 'vagues' }),
  ];
  expect(buildRecommendations({ today: TODAY, summaries })).toEqual([
    '✅ Sorties recommandées : Lun. 16/06, Mer. 18/06 et Dim. 15/06.',
    '🎣 Meilleure journée : Mer. 18/06 (score 85/100).',
    '❌ À éviter : Mar. 17/06, Jeu. 19/06 (vent fort).',
  ]);
});

test('buildRecommendations names the ideal window of the best day', () => {
  const summaries = [
    daySummary('2025-06-15', 45, 'Moyen'),
    daySummary('2025-06-16', 78.4, 'Excellent', { bestWindow: '07h–09h' }),
  ];
  expect(buildRecommendations({ today: TODAY, summaries })).toEqual([
    '✅ Sortie recommandée : Lun. 16/06.',
    '🎣 Meilleure journée : Lun. 16/06 (score 78/100, créneau idéal 07h–09h).',
  ]);
});

test('buildRecommendations without a good day', () => {
  const summaries = [daySummary('2025-06-15', 45, 'Moyen'), daySummary('2025-06-16', 35, 'Moyen')];
  expect(buildRecommendations({ today: TODAY, summaries })).toEqual([
    '⚠️ Aucune journée particulièrement favorable cette semaine.',
  ]);
});

test('buildRecommendations needs upcoming days', () => {
  expect(buildRecommendations({ today: TODAY, summaries: [daySummary(TODAY, 90, 'Excellent')] })).toEqual([
    'Données insuffisantes pour établir des recommandations pour les prochains jours.',
  ]);
});

test('buildTextDigest renders the report body', () => {
  const summaries = [
    daySummary(TODAY, 72.5, 'Excellent', {
      bestWindow: '07h–09h',
      avgWindKts: 8.2,
      windDir: 'N',
      windDirArrow: '↓',
      windDirName: 'Nord',
      avgWaveM: 0.45,
    }),
    daySummary('2025-06-15', 45, 'Moyen', { limitingFactor: 'wavePeriod', limitingFactorLabel: 'houle courte' }),
  ];

  const digest = buildTextDigest({ spotName: SPOT, today: TODAY, summaries });

  expect(digest.subject).toBe('🎣 Pêche Kayak — La Couarde-sur-Mer — 14/06 — Score: 72/100 — Excellent');
  expect(digest.recommendations).toEqual(['⚠️ Aucune journée particulièrement favorable cette semaine.']);
  expect(digest.body.split('\n')).toEqual([
    'Rapport Pêche Kayak — La Couarde-sur-Mer',
    'Date : 14/06/2025',
    'Score : 72/100',
    'Verdict : Excellent',
    '',
    '⚠️ Aucune journée particulièrement favorable cette semaine.',
    '',
    'Sam. 14/06 — 72.5/100 — Excellent — créneau 07h–09h — vent 8.2 kts ↓ Nord — vagues 0.45 m — facteur limitant : vent fort',
    'Dim. 15/06 — 45/100 — Moyen — facteur limitant : houle courte',
  ]);
});
