import { describe, it, expect } from 'vitest';
import {
    authorDateKey,
    chooseSlug,
    cleanTitle,
    describePublication,
    normalizeDoi,
    slugBase,
    stripDisambiguation,
} from '../bibliography/citation.js';
import { extractYear, parseCslSource } from '../bibliography/csl.js';
import { ValidationError } from '../utils/errors.js';

describe('citation text', () => {
    it('should build author-date keys', () => {
        expect(authorDateKey([], 2019)).toBe('<no authors> 2019');
        expect(authorDateKey(['Smith'], 2019)).toBe('Smith 2019');
        expect(authorDateKey(['Smith', 'Jones'], 2019)).toBe('Smith and Jones 2019');
        expect(authorDateKey(['Smith', 'Jones', 'Lee'], 2019)).toBe('Smith et al. 2019');
    });

    it('should truncate long titles to 25 characters', () => {
        expect(describePublication({ title: 'Holocene lake levels in Nova Scotia', year: 2019 }, ['Smith'])).toBe(
            'Smith 2019: "Holocene lake levels in N..."'
        );
        expect(describePublication({ title: 'Holocene lake levels for the region', year: 2019 }, ['Smith'])).toBe(
            'Smith 2019: "Holocene lake levels for..."'
        );
        expect(describePublication({ title: 'Short title', year: 2001 }, [])).toBe('<no authors> 2001: "Short title"');
    });

    it('should clean titles', () => {
        expect(cleanTitle('  {Lake}   {O}ntario\n levels ')).toBe('Lake Ontario levels');
        expect(cleanTitle(undefined)).toBe('');
    });
});

describe('normalizeDoi', () => {
    it('should strip resolver prefixes and lowercase', () => {
        expect(normalizeDoi('https://doi.org/10.1234/ABC')).toBe('10.1234/abc');
        expect(normalizeDoi('http://dx.doi.org/10.1/Y')).toBe('10.1/y');
        expect(normalizeDoi('doi: 10.5/X')).toBe('10.5/x');
    });

    it('should return null for missing identifiers', () => {
        expect(normalizeDoi('')).toBeNull();
        expect(normalizeDoi('   ')).toBeNull();
        expect(normalizeDoi(undefined)).toBeNull();
    });
});

describe('slugs', () => {
    it('should build slug bases from surnames and a two-digit year', () => {
        expect(slugBase([], 2020)).toBe('anon20');
        expect(slugBase(['Smith'], 2019)).toBe('smith19');
        expect(slugBase(['van Dyke', 'Jones'], 2008)).toBe('vandyke_and_jones08');
        expect(slugBase(['Smith', 'Jones', 'Lee'], 2019)).toBe('smith_etal19');
        expect(slugBase(['Smith'], 5)).toBe('smith05');
    });

    it('should fold accents to ASCII', () => {
        expect(slugBase(['Müller'], 2019)).toBe('muller19');
        expect(slugBase(['Ångström'], 1999)).toBe('angstrom99');
    });

    it('should pick the first free disambiguation letter', () => {
        const taken = new Set(['smith19', 'smith19a']);
        expect(chooseSlug('smith19', (slug) => taken.has(slug))).toBe('smith19b');
        expect(chooseSlug('jones21', (slug) => taken.has(slug))).toBe('jones21');
    });

    it('should fail when all 27 candidates are taken', () => {
        const tried: string[] = [];
        expect(() =>
            chooseSlug('smith19', (slug) => {
                tried.push(slug);
                return true;
            })
        ).toThrow(ValidationError);
        expect(tried).toHaveLength(27);
        expect(tried[26]).toBe('smith19z');
    });

    it('should strip one trailing disambiguation letter', () => {
        expect(stripDisambiguation('smith19a')).toBe('smith19');
        expect(stripDisambiguation('smith_etal19z')).toBe('smith_etal19');
        expect(stripDisambiguation('smith19')).toBe('smith19');
        expect(stripDisambiguation('anon')).toBe('anon');
    });
});

describe('CSL-JSON', () => {
    it('should accept a single item or a list', () => {
        expect(parseCslSource('{"id": "a", "title": "One"}')).toHaveLength(1);
        expect(parseCslSource([{ id: 'a' }, { id: 'b' }])).toHaveLength(2);
    });

    it('should keep fields it does not know', () => {
        const [item] = parseCslSource([{ id: 'a', 'container-title': 'Quaternary Research' }]);
        expect(item?.['container-title']).toBe('Quaternary Research');
    });

    it('should reject malformed JSON', () => {
        expect(() => parseCslSource('{not json')).toThrow(/^Malformed CSL-JSON: /);
    });

    it('should report schema problems with the item index', () => {
        try {
            parseCslSource([{ id: 'a' }, { title: 5 }]);
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ValidationError);
            if (error instanceof ValidationError) {
                expect(error.message).toBe('Malformed CSL-JSON: 1 problem(s)');
                expect(error.issues.map((issue) => issue.path)).toEqual([[1, 'title']]);
            }
        }
    });
});

describe('extractYear', () => {
    it('should read year, date and issued in that order', () => {
        expect(extractYear({ year: 2019, date: '2001' }, 'x')).toBe(2019);
        expect(extractYear({ date: '2019-05-01' }, 'x')).toBe(2019);
        expect(extractYear({ issued: { 'date-parts': [[2018, 3]] } }, 'x')).toBe(2018);
        expect(extractYear({ issued: { raw: '2017 spring' } }, 'x')).toBe(2017);
        expect(extractYear({ issued: '2016' }, 'x')).toBe(2016);
    });

    it('should reject unreadable and missing years', () => {
        expect(() => extractYear({ year: 'n.d.' }, 'smith')).toThrow('Unreadable year "n.d." in entry "smith"');
        expect(() => extractYear({}, 'smith')).toThrow('No year in entry "smith"');
    });
});
