import React from 'react';
import {
    ACTIVITY_CATEGORIES,
    EMISSION_FACTORS,
    EMISSIONS_UNIT,
    formatEmissions
} from '../../../shared/emissionFactors';
import type { RecordFilter } from '../services/recordService';
import type { ActivityRecord } from '../storage/activityRecordStore';
import Layout from './Layout';

type Props = {
    username: string;
    records: ActivityRecord[];
    filter: RecordFilter;
    /** Row cap applied to the listing; reaching it means older records may be hidden. */
    limit: number;
    createdId?: number;
};

const RecordListPage: React.FC<Props> = ({ username, records, filter, limit, createdId }) => {
    const listedTotal = records.reduce((sum, record) => sum + record.emissions, 0);

    return (
        <Layout title="History" username={username}>
            {createdId !== undefined ? <p className="alert-success">Activity saved to your history.</p> : null}
            <form method="get" action="/records">
                <select name="category" defaultValue={filter.category ?? ''}>
                    <option value="">All categories</option>
                    {ACTIVITY_CATEGORIES.map((category) => (
                        <option key={category} value={category}>
                            {EMISSION_FACTORS[category].label}
                        </option>
                    ))}
                </select>{' '}
                <input name="from" type="date" defaultValue={filter.from ?? ''} aria-label="From" />{' '}
                <input name="to" type="date" defaultValue={filter.to ?? ''} aria-label="To" />{' '}
                <button type="submit">Filter</button>
            </form>
            {records.length === 0 ? (
                <p>No activities logged yet.</p>
            ) : (
                <table>
                    <thead>
                        <tr>
                            <th>Date</th>
                            <th>Category</th>
                            <th className="number">Quantity</th>
                            <th className="number">Emissions ({EMISSIONS_UNIT})</th>
                        </tr>
                    </thead>
                    <tbody>
                        {records.map((record) => (
                            <tr key={record.id} data-record-id={record.id}>
                                <td>{record.date}</td>
                                <td>{EMISSION_FACTORS[record.category].label}</td>
                                <td className="number">{`${record.quantity} ${EMISSION_FACTORS[record.category].unit}`}</td>
                                <td className="number">{formatEmissions(record.emissions)}</td>
                            </tr>
                        ))}
                    </tbody>
                    <tfoot>
                        <tr>
                            <th colSpan={3}>Total shown</th>
                            <th className="number">{formatEmissions(listedTotal)}</th>
                        </tr>
                    </tfoot>
                </table>
            )}
            {records.length >= limit ? (
                <p className="notice">{`Showing the first ${limit} matching activities. Narrow the dates to see the rest.`}</p>
            ) : null}
        </Layout>
    );
};

export default RecordListPage;
