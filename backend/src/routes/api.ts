import express from 'express';
import { ACTIVITY_CATEGORIES, EMISSION_FACTORS, EMISSIONS_UNIT } from '../../../shared/emissionFactors';
import { getSessionUser, requireApiAuth } from '../middleware/auth';
import { activityInputSchema } from '../services/activityValidation';
import { computeEmissions, estimateAnnualEmissions } from '../services/emissionCalculator';
import { parseRecordFilter, type RecordService } from '../services/recordService';
import { getUtcTodayDateOnly } from '../utils/date';
import { toValidationError, ValidationError } from '../utils/errors';
import { DEFAULT_SUMMARY_PERIOD, isSummaryPeriodName, resolvePeriod } from '../utils/period';
import { readOptionalString } from '../utils/requestParsing';

const sendValidationError = (res: express.Response, err: ValidationError) => {
    res.status(err.status).json({ message: err.message, errors: err.fieldErrors });
};

/**
 * JSON mirror of the HTML pages, plus a stateless calculator.
 */
export function createApiRoutes(records: RecordService): express.Router {
    const router = express.Router();

    router.get('/factors', (_req, res) => {
        res.json({
            unit: EMISSIONS_UNIT,
            factors: ACTIVITY_CATEGORIES.map((category) => EMISSION_FACTORS[category])
        });
    });

    // Estimate without saving anything.
    router.post('/calculate', (req, res) => {
        const parsed = activityInputSchema.safeParse(req.body ?? {});
        if (!parsed.success) {
            return sendValidationError(res, toValidationError(parsed.error, 'Invalid calculation input'));
        }

        const { category, quantity } = parsed.data;
        res.json({
            category,
            quantity,
            quantityUnit: EMISSION_FACTORS[category].unit,
            emissions: computeEmissions(category, quantity),
            annualEstimate: estimateAnnualEmissions(category, quantity),
            unit: EMISSIONS_UNIT
        });
    });

    router.use(requireApiAuth);

    router.get('/records', (req, res, next) => {
        const user = getSessionUser(req);
        try {
            const filter = parseRecordFilter({
                category: req.query.category,
                from: req.query.from,
                to: req.query.to,
                limit: req.query.limit,
                order: req.query.order
            });
            res.json({ records: Array.from(records.list(user.id, filter)) });
        } catch (err) {
            if (err instanceof ValidationError) return sendValidationError(res, err);
            next(err);
        }
    });

    router.post('/records', (req, res, next) => {
        const user = getSessionUser(req);
        const { date, category, quantity } = req.body ?? {};
        try {
            const record = records.create({ userId: user.id, date, category, quantity });
            console.log(`[api] User ${user.id} logged ${record.category} record ${record.id}`);
            res.status(201).json(record);
        } catch (err) {
            if (err instanceof ValidationError) return sendValidationError(res, err);
            next(err);
        }
    });

    router.get('/summary', (req, res) => {
        const user = getSessionUser(req);
        const requested = readOptionalString(req.query.period) ?? DEFAULT_SUMMARY_PERIOD;
        if (!isSummaryPeriodName(requested)) {
            return sendValidationError(
                res,
                new ValidationError('Invalid summary period', { period: 'Unknown summary period.' })
            );
        }

        const summary = records.summarize(user.id, resolvePeriod(requested, getUtcTodayDateOnly()));
        res.json({ period: requested, unit: EMISSIONS_UNIT, ...summary });
    });

    return router;
}
