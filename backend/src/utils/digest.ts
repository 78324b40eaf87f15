import { DailySummary, NO_WINDOW_LABEL } from './aggregation.js';
import { Verdict } from './scoring.js';
import { isDateKey } from './time.js';

const WEEKDAYS_FR = ['Dimanche', 'Lundi', 'Mardi', 'Mercredi', 'Jeudi', 'Vendredi', 'Samedi'];
const MONTHS_FR = [
  'Janvier',
  'Février',
  'Mars',
  'Avril',
  'Mai',
  'Juin',
  'Juillet',
  'Août',
  'Septembre',
  'Octobre',
  'Novembre',
  'Décembre',
];

const VERDICT_EMOJI: Record<Verdict, string> = {
  Excellent: '🎣',
  Favorable: '✅',
  Moyen: '⚠️',
  'Déconseillé': '❌',
};

const RECOMMENDATION_HORIZON_DAYS = 7;

interface DateKeyParts {
  year: number;
  month: number;
  day: number;
  weekday: number;
}

const splitDateKey = (dateKey: string): DateKeyParts | null => {
  if (!isDateKey(dateKey)) {
    return null;
  }
  const date = new Date(`${dateKey}T00:00:00Z`);
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth(),
    day: date.getUTCDate(),
    weekday: date.getUTCDay(),
  };
};

const pad2 = (value: number): string => String(value).padStart(2, '0');

// `Sam. 14/06`
export const formatShortDateFr = (dateKey: string): string => {
  const parts = splitDateKey(dateKey);
  if (!parts) {
    return dateKey;
  }
  return `${WEEKDAYS_FR[parts.weekday].slice(0, 3)}. ${pad2(parts.day)}/${pad2(parts.month + 1)}`;
};

// `Samedi 14 Juin 2025`
export const formatLongDateFr = (dateKey: string): string => {
  const parts = splitDateKey(dateKey);
  if (!parts) {
    return dateKey;
  }
  return `${WEEKDAYS_FR[parts.weekday]} ${parts.day} ${MONTHS_FR[parts.month]} ${parts.year}`;
};

const formatNumericDateFr = (dateKey: string, withYear: boolean): string => {
  const parts = splitDateKey(dateKey);
  if (!parts) {
    return dateKey;
  }
  const dayMonth = `${pad2(parts.day)}/${pad2(parts.month + 1)}`;
  return withYear ? `${dayMonth}/${parts.year}` : dayMonth;
};

interface BuildSubjectLineOptions {
  spotName: string;
  today: string;
  summaries: readonly DailySummary[];
}

export const buildSubjectLine = ({ spotName, today, summaries }: BuildSubjectLineOptions): string => {
  const todaySummary = summaries.find((summary) => summary.date === today);
  if (!todaySummary) {
    return `📊 Pêche Kayak — ${spotName} — ${formatNumericDateFr(today, true)}`;
  }
  const emoji = VERDICT_EMOJI[todaySummary.verdict];
  return `${emoji} Pêche Kayak — ${spotName} — ${formatNumericDateFr(today, false)} — Score: ${Math.trunc(todaySummary.dailyScore)}/100 — ${todaySummary.verdict}`;
};

const joinFrenchList = (items: string[]): string => {
  if (items.length <= 1) {
    return items.join('');
  }
  return `${items.slice(0, -1).join(', ')} et ${items[items.length - 1]}`;
};

interface BuildRecommendationsOptions {
  today: string;
  summaries: readonly DailySummary[];
}

export const buildRecommendations = ({ today, summaries }: BuildRecommendationsOptions): string[] => {
  const upcoming = summaries.filter((summary) => summary.date > today).slice(0, RECOMMENDATION_HORIZON_DAYS);
  if (!upcoming.length) {
    return ['Données insuffisantes pour établir des recommandations pour les prochains jours.'];
  }

  const excellent = upcoming.filter((summary) => summary.verdict === 'Excellent');
  const favorable = upcoming.filter((summary) => summary.verdict === 'Favorable');
  const avoid = upcoming.filter((summary) => summary.verdict === 'Déconseillé');
  const lines: string[] = [];

  const goodDays = [...excellent, ...favorable];
  if (goodDays.length === 1) {
    lines.push(`✅ Sortie recommandée : ${formatShortDateFr(goodDays[0].date)}.`);
  } else if (goodDays.length > 1) {
    const names = goodDays.slice(0, 3).map((summary) => formatShortDateFr(summary.date));
    lines.push(`✅ Sorties recommandées : ${joinFrenchList(names)}.`);
  } else {
    lines.push('⚠️ Aucune journée particulièrement favorable cette semaine.');
  }

  if (excellent.length) {
    const best = excellent.reduce((top, summary) => (summary.dailyScore > top.dailyScore ? summary : top));
    const windowPart = best.bestWindow !== NO_WINDOW_LABEL ? `, créneau idéal ${best.bestWindow}` : '';
    lines.push(
      `🎣 Meilleure journée : ${formatShortDateFr(best.date)} (score ${Math.trunc(best.dailyScore)}/100${windowPart}).`,
    );
  }

  if (avoid.length) {
    const flagged = avoid.slice(0, 2);
    const names = flagged.map((summary) => formatShortDateFr(summary.date)).join(', ');
    lines.push(`❌ À éviter : ${names} (${flagged[0].limitingFactorLabel}).`);
  }

  return lines;
};

const formatDayLine = (summary: DailySummary): string => {
  const parts = [
    `${formatShortDateFr(summary.date)} — ${summary.dailyScore}/100 — ${summary.verdict}`,
  ];
  if (summary.bestWindow !== NO_WINDOW_LABEL) {
    parts.push(`créneau ${summary.bestWindow}`);
  }
  if (summary.avgWindKts !== null) {
    parts.push(`vent ${summary.avgWindKts} kts ${summary.windDirArrow} ${summary.windDirName}`);
  }
  if (summary.avgWaveM !== null) {
    parts.push(`vagues ${summary.avgWaveM} m`);
  }
  parts.push(`facteur limitant : ${summary.limitingFactorLabel}`);
  return parts.join(' — ');
};

interface BuildTextDigestOptions extends BuildRecommendationsOptions {
  spotName: string;
}

export interface TextDigest {
  subject: string;
  body: string;
  recommendations: string[];
}

export const buildTextDigest = ({ spotName, today, summaries }: BuildTextDigestOptions): TextDigest => {
  const subject = buildSubjectLine({ spotName, today, summaries });
  const recommendations = buildRecommendations({ today, summaries });
  const todaySummary = summaries.find((summary) => summary.date === today);

  const lines = [`Rapport Pêche Kayak — ${spotName}`, `Date : ${formatNumericDateFr(today, true)}`];
  if (todaySummary) {
    lines.push(`Score : ${Math.trunc(todaySummary.dailyScore)}/100`, `Verdict : ${todaySummary.verdict}`);
  }
  lines.push('', ...recommendations);
  if (summaries.length) {
    lines.push('', ...summaries.map(formatDayLine));
  }

  return { subject, body: lines.join('\n'), recommendations };
};
