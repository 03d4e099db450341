import { AnnotationStore } from '../annotations/store.js';
import { RevisionLog } from '../audit/revisions.js';
import { CuratorDatabase } from './database.js';
import { FeatureRepository } from './features.js';
import { ParameterRepository } from './parameters.js';
import { PeopleRepository } from './people.js';
import { PublicationRepository } from './publications.js';
import { RecordRepository } from './records.js';

/**
 * Every repository over one database connection.
 */
export interface CuratorStore {
    db: CuratorDatabase;
    people: PeopleRepository;
    publications: PublicationRepository;
    features: FeatureRepository;
    records: RecordRepository;
    parameters: ParameterRepository;
    annotations: AnnotationStore;
    revisions: RevisionLog;
}

export function createStore(db: CuratorDatabase): CuratorStore {
    return {
        db,
        people: new PeopleRepository(db),
        publications: new PublicationRepository(db),
        features: new FeatureRepository(db),
        records: new RecordRepository(db),
        parameters: new ParameterRepository(db),
        annotations: new AnnotationStore(db),
        revisions: new RevisionLog(db),
    };
}

/**
 * Open (and migrate) a database file, or ":memory:", and build the store on it.
 */
export function openStore(dbPath: string): CuratorStore {
    return createStore(new CuratorDatabase(dbPath));
}

export { CuratorDatabase } from './database.js';
export type { StatTable } from './database.js';
export { FeatureRepository } from './features.js';
export { ParameterRepository } from './parameters.js';
export { PeopleRepository, formatPersonName } from './people.js';
export type { ReassignResult } from './people.js';
export { PublicationRepository } from './publications.js';
export { RecordRepository } from './records.js';
