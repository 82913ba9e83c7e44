import { ANGLE_LABELS, GroupAverage, Report, ReportRow } from '../domain/types'

const TITLE_LENGTH = 60

function cell(text: string): string {
  return text.replace(/\s+/g, ' ').replace(/\|/g, '\\|').trim()
}

function shortTitle(title: string): string {
  const clean = cell(title)
  if (!clean) return '(untitled)'
  return clean.length > TITLE_LENGTH ? `${clean.slice(0, TITLE_LENGTH - 3)}...` : clean
}

function percent(ratio: number | null): string {
  return ratio === null ? '-' : `${Math.round(ratio * 100)}%`
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`
}

function groupLine(label: string, group: GroupAverage | null, name: (value: string) => string): string {
  if (!group) return `- **${label}:** n/a (no scored posts yet)`
  return `- **${label}:** ${name(group.name)} (avg score ${group.averageScore.toFixed(1)} over ${plural(group.postCount, 'post')})`
}

function angleName(value: string): string {
  const match = Object.entries(ANGLE_LABELS).find(([angle]) => angle === value)
  return match ? match[1] : value
}

function rowLine(row: ReportRow): string {
  const score = row.pending ? 'pending' : String(row.score)
  const comments = row.commentCount === null ? '-' : String(row.commentCount)
  return `| ${shortTitle(row.title)} | r/${row.subreddit} | ${score} | ${comments} | ${percent(row.upvoteRatio)} | ${ANGLE_LABELS[row.angle]} | ${row.postedAt.slice(0, 10)} |`
}

// No timestamps in here: the generation time lives in the report's meta file.
export function renderReport(report: Report): string {
  const { insights } = report
  const top = insights.topPost

  const lines = [
    `# Reddit Performance Report: ${report.period}`,
    '',
    `**Posts:** ${insights.postCount} (${insights.pendingCount} pending)`,
    '',
    '## Posts',
    '',
    '| Title | Subreddit | Score | Comments | Upvote % | Angle | Posted |',
    '|-------|-----------|-------|----------|----------|-------|--------|',
    ...report.rows.map(rowLine),
    '',
    '## Insights',
    '',
    groupLine('Best subreddit', insights.bestSubreddit, name => `r/${name}`),
    groupLine('Best angle', insights.bestAngle, angleName),
    groupLine('Best posting day', insights.bestWeekday, name => name),
    top
      ? `- **Top post:** "${shortTitle(top.title)}" (${top.score} points, ${plural(top.commentCount, 'comment')}, r/${top.subreddit})`
      : '- **Top post:** n/a (no scored posts yet)',
    `- **Averages:** score ${insights.averages.score.toFixed(1)} | comments ${insights.averages.commentCount.toFixed(1)} | upvote ratio ${percent(insights.averages.upvoteRatio)}`,
    '',
    '## Recommendations',
    '',
    ...report.recommendations.map((text, index) => `${index + 1}. ${text}`),
    '',
  ]

  return lines.join('\n')
}
