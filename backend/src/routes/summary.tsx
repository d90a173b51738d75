import express from 'express';
import { getSessionUser, requireLogin } from '../middleware/auth';
import type { RecordService } from '../services/recordService';
import { getUtcTodayDateOnly } from '../utils/date';
import { DEFAULT_SUMMARY_PERIOD, isSummaryPeriodName, resolvePeriod } from '../utils/period';
import { readOptionalString } from '../utils/requestParsing';
import ErrorPage from '../views/ErrorPage';
import SummaryPage from '../views/SummaryPage';
import { sendPage } from '../views/render';

export function createSummaryRoutes(records: RecordService): express.Router {
    const router = express.Router();

    router.use(requireLogin);

    router.get('/', (req, res) => {
        const user = getSessionUser(req);
        const requested = readOptionalString(req.query.period) ?? DEFAULT_SUMMARY_PERIOD;
        if (!isSummaryPeriodName(requested)) {
            return sendPage(
                res,
                <ErrorPage title="Invalid period" message="Unknown summary period." username={user.username} />,
                400
            );
        }

        const summary = records.summarize(user.id, resolvePeriod(requested, getUtcTodayDateOnly()));
        sendPage(res, <SummaryPage username={user.username} period={requested} summary={summary} />);
    });

    return router;
}
