import React from 'react';
import { ACTIVITY_CATEGORIES, EMISSION_FACTORS } from '../../../shared/emissionFactors';
import type { FieldErrors } from '../utils/errors';
import FieldError from './FieldError';
import Layout from './Layout';

export type RecordFormValues = {
    date: string;
    category: string;
    quantity: string;
};

type Props = {
    username: string;
    values: RecordFormValues;
    errors?: FieldErrors;
};

/**
 * Activity entry form. Emissions are never part of the form; the server derives them.
 */
const RecordFormPage: React.FC<Props> = ({ username, values, errors = {} }) => (
    <Layout title="Log activity" username={username}>
        {Object.keys(errors).length > 0 ? (
            <p className="alert-error">Please correct the highlighted fields.</p>
        ) : null}
        <form method="post" action="/records">
            <label>
                Date
                <input name="date" type="date" defaultValue={values.date} required />
            </label>
            <FieldError message={errors.date} />
            <label>
                Category
                <select name="category" defaultValue={values.category}>
                    {ACTIVITY_CATEGORIES.map((category) => {
                        const { label, unit, factor } = EMISSION_FACTORS[category];
                        return (
                            <option key={category} value={category}>
                                {`${label} (${unit}, ${factor} kg CO2e/${unit})`}
                            </option>
                        );
                    })}
                </select>
            </label>
            <FieldError message={errors.category} />
            <label>
                Quantity
                <input name="quantity" inputMode="decimal" defaultValue={values.quantity} required />
            </label>
            <FieldError message={errors.quantity} />
            <p>
                <button type="submit">Save</button>
            </p>
        </form>
    </Layout>
);

export default RecordFormPage;
