import React from 'react';
import { EMISSION_FACTORS, EMISSIONS_UNIT, formatEmissions } from '../../../shared/emissionFactors';
import type { EmissionsSummary } from '../services/recordService';
import { SUMMARY_PERIODS, type SummaryPeriodName } from '../utils/period';
import Layout from './Layout';

type Props = {
    username: string;
    period: SummaryPeriodName;
    summary: EmissionsSummary;
};

const PERIOD_LABELS: Record<SummaryPeriodName, string> = {
    day: 'Today',
    week: 'This week',
    month: 'This month',
    year: 'This year',
    all: 'All time'
};

function describeRange(summary: EmissionsSummary): string {
    if (!summary.from && !summary.to) return 'All recorded activity';
    if (summary.from === summary.to) return summary.from ?? '';
    return `${summary.from ?? '…'} to ${summary.to ?? '…'}`;
}

const SummaryPage: React.FC<Props> = ({ username, period, summary }) => (
    <Layout title="Summary" username={username}>
        <form method="get" action="/summary">
            <select name="period" defaultValue={period}>
                {SUMMARY_PERIODS.map((name) => (
                    <option key={name} value={name}>
                        {PERIOD_LABELS[name]}
                    </option>
                ))}
            </select>{' '}
            <button type="submit">Show</button>
        </form>
        <p>{describeRange(summary)}</p>
        <p>
            <strong data-summary-total="">{`${formatEmissions(summary.total)} ${EMISSIONS_UNIT}`}</strong>
            {` across ${summary.count} ${summary.count === 1 ? 'activity' : 'activities'}`}
        </p>
        <table>
            <thead>
                <tr>
                    <th>Category</th>
                    <th className="number">Activities</th>
                    <th className="number">Emissions ({EMISSIONS_UNIT})</th>
                </tr>
            </thead>
            <tbody>
                {summary.breakdown.map((entry) => (
                    <tr key={entry.category} data-category={entry.category}>
                        <td>{EMISSION_FACTORS[entry.category].label}</td>
                        <td className="number">{entry.count}</td>
                        <td className="number">{formatEmissions(entry.total)}</td>
                    </tr>
                ))}
            </tbody>
        </table>
    </Layout>
);

export default SummaryPage;
