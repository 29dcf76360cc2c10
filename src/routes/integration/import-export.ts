import { Router } from 'express';
import Container from 'typedi';
import { sendError } from '../../lib/http';
import { requireUser } from '../../middleware/auth';
import { ExportService, exportFilename } from '../../services/integration/ExportService';
import { ImportService } from '../../services/integration/ImportService';
import { importJsonSchema } from '../../validation/import.schemas';

const router = Router();

const XLSX_MIME = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

router.get('/export/json', async (req, res) => {
    try {
        const bundle = await Container.get(ExportService).buildBundle();
        res.setHeader('Content-Disposition', `attachment; filename="${exportFilename('json')}"`);
        res.type('application/json').send(JSON.stringify(bundle, null, 2));
    } catch (error) {
        sendError(res, error);
    }
});

router.get('/export/excel', async (req, res) => {
    try {
        const buffer = await Container.get(ExportService).exportExcel();
        res.setHeader('Content-Disposition', `attachment; filename="${exportFilename('xlsx')}"`);
        res.type(XLSX_MIME).send(buffer);
    } catch (error) {
        sendError(res, error);
    }
});

// POST /api/import-export/import/json { project_id, data: <export bundle> }
router.post('/import/json', async (req, res) => {
    try {
        const input = importJsonSchema.parse(req.body);
        res.json(await Container.get(ImportService).importJson(input, requireUser(req)));
    } catch (error) {
        sendError(res, error);
    }
});

export const importExportRouter = router;
