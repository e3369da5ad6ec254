import { ContentStore } from '../clients/FileStorageClient.js';
import { UploadJoinCoordinator, UploadSessionActions, UploadSessionHandle } from './UploadJoinCoordinator.js';

export interface UploadPart {
    readonly data: Buffer;
    readonly description: string;
}

/**
 * Opens a session over the given parts and issues one store call per part,
 * routing each outcome back to the session under the part's tag.
 */
export function storeParts(
    coordinator: UploadJoinCoordinator,
    store: ContentStore,
    parts: Readonly<Record<string, UploadPart>>,
    actions: UploadSessionActions
): UploadSessionHandle {
    const session = coordinator.begin(Object.keys(parts), actions);

    for (const [tag, part] of Object.entries(parts)) {
        store.putFile(part.data, part.description, outcome => {
            if (outcome.ok) {
                coordinator.reportSuccess(session, outcome.tag, outcome.digest);
            } else {
                coordinator.reportFailure(session, outcome.tag, outcome.error);
            }
        }, tag);
    }

    return session;
}
