import express, { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { logger } from '../../../libs/logging/logger.js';
import { ErrorSanitizer } from '../../../libs/errors/sanitizer.js';
import {
    AddressingError,
    RemoteCallError,
    TransportError,
    UnknownServiceError,
    isCoordinationError
} from '../../../libs/errors/coordinationErrors.js';
import { createValidator } from '../../../libs/validation/zod-middleware.js';
import { serviceCoord } from '../../../libs/services/serviceCoord.js';
import { ServiceRegistry } from '../../../libs/services/ServiceRegistry.js';
import { RpcProxy } from '../../../libs/rpc/RpcProxy.js';
import { ContentStore } from '../../../libs/clients/FileStorageClient.js';
import { NotificationQueue } from '../../../libs/notifications/NotificationQueue.js';
import { QuestionSource, pollNotifications } from '../../../libs/notifications/poll.js';
import { ActionResult, TaskFileService } from '../../../libs/admin/TaskFileService.js';
import { ReevaluationService } from '../../../libs/admin/ReevaluationService.js';

export interface AdminAppDeps {
    readonly registry: ServiceRegistry;
    readonly proxy: RpcProxy;
    readonly notifications: NotificationQueue;
    readonly questions: QuestionSource;
    readonly taskFiles: TaskFileService;
    readonly reevaluation: ReevaluationService;
    readonly store: ContentStore;
}

const Base64 = z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/, 'must be base64');

const IdParam = z.coerce.number().int().nonnegative();

const FileBodySchema = z.object({
    filename: z.string().min(1).max(255),
    body: Base64
});

const TestcaseBodySchema = z.object({
    input: Base64,
    output: Base64,
    public: z.boolean().default(false)
});

const FileParamsSchema = z.object({
    digest: z.string().regex(/^[0-9A-Za-z]+$/, 'must be alphanumeric'),
    filename: z.string().min(1).max(255).regex(/^[^/\\"\r\n]+$/, 'must be a plain file name')
});

const RpcArgsSchema = z.record(z.unknown());

const PollQuerySchema = z.object({
    last_notification: z.coerce.number().nonnegative().default(0)
});

const parseId = createValidator(IdParam);
const parseFileBody = createValidator(FileBodySchema);
const parseTestcaseBody = createValidator(TestcaseBodySchema);
const parseFileParams = createValidator(FileParamsSchema);
const parseRpcArgs = createValidator(RpcArgsSchema);
const parsePollQuery = createValidator(PollQuerySchema);

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncHandler) {
    return (req: Request, res: Response, next: NextFunction) => {
        handler(req, res).catch(next);
    };
}

function decodeFile(body: unknown, context: string) {
    const file = parseFileBody(body, context);
    return { filename: file.filename, body: Buffer.from(file.body, 'base64') };
}

function finishUpload(res: Response, result: ActionResult, taskId: number, formPath: string): void {
    if (result.ok) {
        res.redirect(`/task/${taskId}`);
    } else if (result.error === 'not-found') {
        res.status(404).json({ error: 'Task not found' });
    } else {
        res.redirect(`${formPath}/${taskId}`);
    }
}

export function createApp(deps: AdminAppDeps): express.Express {
    const app = express();
    app.disable('x-powered-by');
    app.use(express.json({ limit: '64mb' }));

    app.use((_req, res, next) => {
        res.set('Cache-Control', 'no-cache, must-revalidate');
        next();
    });

    app.get('/notifications', route(async (req, res) => {
        const { last_notification } = parsePollQuery(req.query, 'AdminWeb:NotificationsQuery');
        res.json(await pollNotifications(deps.notifications, deps.questions, last_notification));
    }));

    app.post('/rpc_request/:service/:shard/:method', route(async (req, res) => {
        const shard = parseId(req.params.shard, 'AdminWeb:RpcShard');
        const coord = serviceCoord(req.params.service, shard);
        const args = parseRpcArgs(req.body ?? {}, 'AdminWeb:RpcArguments');

        const forwarded = await deps.proxy.forward(coord, req.params.method, args);
        if (forwarded.status === 'denied') {
            res.status(forwarded.error.statusCode).json({ error: forwarded.error.message });
            return;
        }

        const { outcome } = forwarded;
        if (outcome.ok) {
            res.json({ result: outcome.result });
        } else if (outcome.kind === 'remote') {
            res.json({ error: outcome.error });
        } else {
            res.status(502).json({ error: outcome.error });
        }
    }));

    app.get('/resources', (_req, res) => {
        const addresses: Record<number, string> = {};
        let shards = 0;
        try {
            for (const coord of deps.registry.coordsOf('ResourceService')) {
                addresses[coord.shard] = deps.registry.address(coord).host;
            }
            shards = deps.registry.shardCount('ResourceService');
        } catch (error) {
            if (!(error instanceof UnknownServiceError)) throw error;
        }
        res.json({ resource_shards: shards, resource_addresses: addresses });
    });

    app.get('/file/:digest/:filename', route(async (req, res) => {
        const { digest, filename } = parseFileParams(req.params, 'AdminWeb:FileParams');
        let body: Buffer;
        try {
            body = await deps.store.getFile(digest);
        } catch (error) {
            if (error instanceof TransportError || error instanceof RemoteCallError || error instanceof AddressingError) {
                logger.warn({ digest, code: error.code }, error.message);
                res.status(502).json({ error: error.message });
                return;
            }
            throw error;
        }
        // Content type follows the extension: statements come back as application/pdf.
        res.attachment(filename);
        res.send(body);
    }));

    app.post('/add_statement/:taskId', route(async (req, res) => {
        const taskId = parseId(req.params.taskId, 'AdminWeb:TaskId');
        const file = decodeFile(req.body, 'AdminWeb:Statement');
        finishUpload(res, await deps.taskFiles.addStatement(taskId, file), taskId, '/add_statement');
    }));

    app.post('/add_attachment/:taskId', route(async (req, res) => {
        const taskId = parseId(req.params.taskId, 'AdminWeb:TaskId');
        const file = decodeFile(req.body, 'AdminWeb:Attachment');
        finishUpload(res, await deps.taskFiles.addAttachment(taskId, file), taskId, '/add_attachment');
    }));

    app.post('/add_manager/:taskId', route(async (req, res) => {
        const taskId = parseId(req.params.taskId, 'AdminWeb:TaskId');
        const file = decodeFile(req.body, 'AdminWeb:Manager');
        finishUpload(res, await deps.taskFiles.addManager(taskId, file), taskId, '/add_manager');
    }));

    app.post('/add_testcase/:taskId', route(async (req, res) => {
        const taskId = parseId(req.params.taskId, 'AdminWeb:TaskId');
        const body = parseTestcaseBody(req.body, 'AdminWeb:Testcase');
        const result = await deps.taskFiles.addTestcase(
            taskId,
            Buffer.from(body.input, 'base64'),
            Buffer.from(body.output, 'base64'),
            body.public
        );
        finishUpload(res, result, taskId, '/add_testcase');
    }));

    app.get('/reevaluate/submission/:id', route(async (req, res) => {
        const submissionId = parseId(req.params.id, 'AdminWeb:SubmissionId');
        const report = await deps.reevaluation.reevaluateSubmission(submissionId);
        if (!report) {
            res.status(404).json({ error: 'Submission not found' });
            return;
        }
        res.redirect(`/submission/${submissionId}`);
    }));

    app.get('/reevaluate/user/:id', route(async (req, res) => {
        const userId = parseId(req.params.id, 'AdminWeb:UserId');
        await deps.reevaluation.reevaluateUser(userId);
        res.redirect(`/user/${userId}`);
    }));

    app.get('/reevaluate/task/:id', route(async (req, res) => {
        const taskId = parseId(req.params.id, 'AdminWeb:TaskId');
        await deps.reevaluation.reevaluateTask(taskId);
        res.redirect(`/task/${taskId}`);
    }));

    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (isCoordinationError(err) && err.statusCode < 500) {
            logger.warn({ path: req.path, code: err.code }, err.message);
            res.status(err.statusCode).json({ error: err.message, code: err.code });
            return;
        }
        const sanitized = ErrorSanitizer.sanitize(err, `AdminWeb:${req.method} ${req.path}`);
        res.status(sanitized.statusCode).json({ error: sanitized.publicMessage, incidentId: sanitized.incidentId });
    });

    return app;
}
