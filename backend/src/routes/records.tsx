import express from 'express';
import { requireLogin, getSessionUser } from '../middleware/auth';
import type { RecordService } from '../services/recordService';
import { parseRecordFilter, resolveListLimit } from '../services/recordService';
import { formatDateOnly, getUtcTodayDateOnly } from '../utils/date';
import { ValidationError } from '../utils/errors';
import { parsePositiveInteger, readFormValue } from '../utils/requestParsing';
import ErrorPage from '../views/ErrorPage';
import RecordFormPage from '../views/RecordFormPage';
import RecordListPage from '../views/RecordListPage';
import { sendPage } from '../views/render';

export function createRecordRoutes(records: RecordService): express.Router {
    const router = express.Router();

    router.use(requireLogin);

    router.get('/new', (req, res) => {
        const user = getSessionUser(req);
        const values = { date: formatDateOnly(getUtcTodayDateOnly()), category: 'transport', quantity: '' };
        sendPage(res, <RecordFormPage username={user.username} values={values} />);
    });

    router.post('/', (req, res, next) => {
        const user = getSessionUser(req);
        const { date, category, quantity } = req.body;
        try {
            const record = records.create({ userId: user.id, date, category, quantity });
            console.log(`[records] User ${user.id} logged ${record.category} record ${record.id}`);
            res.redirect(303, `/records?created=${record.id}`);
        } catch (err) {
            if (err instanceof ValidationError) {
                const values = {
                    date: readFormValue(date),
                    category: readFormValue(category),
                    quantity: readFormValue(quantity)
                };
                return sendPage(
                    res,
                    <RecordFormPage username={user.username} values={values} errors={err.fieldErrors} />,
                    400
                );
            }
            next(err);
        }
    });

    router.get('/', (req, res, next) => {
        const user = getSessionUser(req);
        try {
            const filter = parseRecordFilter({
                category: req.query.category,
                from: req.query.from,
                to: req.query.to,
                limit: req.query.limit
            });
            const listed = Array.from(records.list(user.id, filter));
            const createdId = parsePositiveInteger(req.query.created) ?? undefined;
            sendPage(
                res,
                <RecordListPage
                    username={user.username}
                    records={listed}
                    filter={filter}
                    limit={resolveListLimit(filter)}
                    createdId={createdId}
                />
            );
        } catch (err) {
            if (err instanceof ValidationError) {
                const message = Object.values(err.fieldErrors)[0] ?? err.message;
                return sendPage(res, <ErrorPage title="Invalid filter" message={message} username={user.username} />, 400);
            }
            next(err);
        }
    });

    return router;
}
