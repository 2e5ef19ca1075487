import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import 'dotenv/config';
import { errorHandlerMiddleware, notFoundHandler } from './middleware/error-handler.middleware';
import { metricsMiddleware } from './middleware/metrics.middleware';
import { RunsController } from './controllers/runs.controller';
import { ReportsController } from './controllers/reports.controller';
import { getMetrics, healthCheck } from './controllers/metrics.controller';

const app = express();

app.use(helmet());
app.use(cors());
app.use(express.json());
app.use(express.urlencoded({ extended: true }));

app.use(metricsMiddleware);

app.get('/health', healthCheck);
app.get('/metrics', getMetrics);

const runsController = new RunsController();
const reportsController = new ReportsController();

app.get('/api/runs', runsController.listRuns);
app.get('/api/runs/:id', runsController.getRun);
app.post('/api/runs', runsController.triggerRun);

app.get('/api/reports/monthly-encounters', reportsController.monthlyEncounters);
app.get('/api/reports/diagnosis-procedure-pairs', reportsController.diagnosisProcedurePairs);
app.get('/api/reports/readmission-rates', reportsController.readmissionRates);
app.get('/api/reports/revenue', reportsController.revenue);

app.use(notFoundHandler);

app.use(errorHandlerMiddleware);

export default app;
