import { logger } from "../../../libs/logging/logger.js";
import { ConfigGuard } from "../../../libs/bootstrap/config-guard.js";
import { ADMIN_CONFIG_GUARDS, readAdminSettings } from "../../../libs/bootstrap/config/admin-config.js";
import { loadServiceConfig } from "../../../libs/config/serviceConfig.js";
import { ServiceRegistry } from "../../../libs/services/ServiceRegistry.js";
import { serviceCoord } from "../../../libs/services/serviceCoord.js";
import { ServiceMesh } from "../../../libs/rpc/ServiceMesh.js";
import { RpcProxy } from "../../../libs/rpc/RpcProxy.js";
import { createPool } from "../../../libs/db/index.js";
import { PgContestRepository } from "../../../libs/contest/PgContestRepository.js";
import { UploadJoinCoordinator } from "../../../libs/upload/UploadJoinCoordinator.js";
import { NotificationQueue } from "../../../libs/notifications/NotificationQueue.js";
import { FileStorageClient } from "../../../libs/clients/FileStorageClient.js";
import { EvaluationServiceClient } from "../../../libs/clients/EvaluationServiceClient.js";
import { TaskFileService } from "../../../libs/admin/TaskFileService.js";
import { ReevaluationService } from "../../../libs/admin/ReevaluationService.js";
import { createApp } from "./app.js";

async function main() {
    // Fail closed on missing or malformed configuration
    ConfigGuard.enforce(ADMIN_CONFIG_GUARDS);
    const settings = readAdminSettings();

    const registry = new ServiceRegistry(loadServiceConfig(settings.servicesConfigPath));
    const mesh = new ServiceMesh(registry, {
        timeoutMs: settings.rpcTimeoutMs,
        reconnectDelayMs: settings.reconnectDelayMs
    });

    const evaluationChannel = mesh.connectTo(serviceCoord("EvaluationService", 0));
    mesh.connectToAll("ResourceService");
    mesh.connectTo(serviceCoord("LogService", 0));
    const storageChannel = mesh.connectTo(serviceCoord("FileStorage", 0));

    const pool = createPool();
    const repository = new PgContestRepository(pool);
    const notifications = new NotificationQueue();
    const coordinator = new UploadJoinCoordinator();
    const store = new FileStorageClient(storageChannel);

    const app = createApp({
        registry,
        proxy: new RpcProxy(mesh),
        notifications,
        questions: repository,
        taskFiles: new TaskFileService({
            repository,
            store,
            coordinator,
            notifications
        }),
        reevaluation: new ReevaluationService(
            repository,
            new EvaluationServiceClient(evaluationChannel),
            notifications
        ),
        store
    });

    const server = app.listen(settings.listenPort, () => {
        logger.info(
            { port: settings.listenPort, shard: settings.shard, services: registry.serviceNames() },
            "Admin web server listening"
        );
    });

    const shutdown = (signal: string) => {
        logger.info({ signal }, "Admin web server shutting down");
        mesh.closeAll();
        server.close();
        pool.end().catch(err => logger.error({ err }, "Error while closing the database pool"));
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
