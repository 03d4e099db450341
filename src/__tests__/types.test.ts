import { describe, it, expect } from 'vitest';
import {
    DEFAULT_CONFIG,
    ENTITY_KINDS,
    FEATURE_TYPES,
    RECORD_AUTHOR_ROLES,
    RECORD_REFERENCE_TYPES,
    RECORD_TYPES,
} from '../types/index.js';
import { CSL_TYPES, cslTypeForBibtex } from '../bibliography/csl-types.js';

describe('Types', () => {
    describe('entity kinds', () => {
        it('should cover the five annotatable entities', () => {
            expect(ENTITY_KINDS).toEqual(['person', 'publication', 'feature', 'record', 'parameter']);
        });

        it('should list five feature types', () => {
            expect(FEATURE_TYPES).toHaveLength(5);
        });

        it('should list six record authorship roles', () => {
            expect(RECORD_AUTHOR_ROLES).toEqual(['assisted', 'collected', 'funded', 'analyzed', 'published', 'maintains']);
        });

        it('should include the core types among record types', () => {
            expect(RECORD_TYPES).toEqual(expect.arrayContaining(['sediment_core', 'ice_core', 'peat_core']));
            expect(RECORD_REFERENCE_TYPES).toEqual(['refers_to', 'contains_data_from']);
        });
    });

    describe('CSL types', () => {
        it('should load the CSL item types from data/csl-types.json', () => {
            expect(CSL_TYPES.has('article-journal')).toBe(true);
            expect(CSL_TYPES.has('document')).toBe(true);
            expect(CSL_TYPES.has('journal-article')).toBe(false);
        });

        it('should map BibTeX entry types onto CSL types', () => {
            expect(cslTypeForBibtex('article')).toBe('article-journal');
            expect(cslTypeForBibtex('InProceedings')).toBe('paper-conference');
            expect(cslTypeForBibtex('phdthesis')).toBe('thesis');
            expect(cslTypeForBibtex('nonsense')).toBe('document');
        });
    });

    describe('DEFAULT_CONFIG', () => {
        it('should default the database path and actor', () => {
            expect(DEFAULT_CONFIG.db).toBe('./paleo-curator.db');
            expect(DEFAULT_CONFIG.actor).toBe('curator');
        });

        it('should import in chunks of 50', () => {
            expect(DEFAULT_CONFIG.import.chunkSize).toBe(50);
        });

        it('should update authors but keep slugs by default', () => {
            expect(DEFAULT_CONFIG.import.updateAuthors).toBe(true);
            expect(DEFAULT_CONFIG.import.regenerateSlugs).toBe(false);
            expect(DEFAULT_CONFIG.import.tagResidualFields).toBe(true);
        });
    });
});
