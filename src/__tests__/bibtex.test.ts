import { describe, it, expect } from 'vitest';
import { BibtexParseError, formatBibtexEntry, parseBibtex } from '../bibliography/bibtex.js';
import { latexToUnicode } from '../bibliography/latex.js';
import {
    citationSurname,
    cslNameToPersonName,
    parseBibtexName,
    parseBibtexNames,
    personFields,
    renderAlias,
    splitBibtexNames,
} from '../bibliography/names.js';
import { cslTypeForBibtex } from '../bibliography/csl-types.js';
import { ValidationError } from '../utils/errors.js';

describe('parseBibtex', () => {
    const source = [
        '@string{ pal = "Palaeogeography" }',
        '@comment{ignored {nested} block}',
        'Free text between entries is ignored.',
        '@article{smith2019,',
        '  author = {Smith, Jane and van Dyke, Jr, Peter},',
        '  title = {Lake {Ontario}',
        '           levels},',
        '  journal = pal # " Letters",',
        '  year = 2019,',
        '  month = jul,',
        '}',
        '@book(jones08, title = "Quoted {"}value", year = "2008")',
    ].join('\n');

    it('should read entries in source order', () => {
        const entries = parseBibtex(source);
        expect(entries.map((e) => [e.key, e.type, e.line])).toEqual([
            ['smith2019', 'article', 4],
            ['jones08', 'book', 12],
        ]);
    });

    it('should expand macros and concatenations and collapse whitespace', () => {
        const [smith] = parseBibtex(source);
        expect(smith?.fields).toEqual({
            author: 'Smith, Jane and van Dyke, Jr, Peter',
            title: 'Lake {Ontario} levels',
            journal: 'Palaeogeography Letters',
            year: '2019',
            month: 'July',
        });
    });

    it('should accept parentheses and braces inside quoted values', () => {
        const jones = parseBibtex(source)[1];
        expect(jones?.fields).toEqual({ title: 'Quoted {"}value', year: '2008' });
    });

    it('should return nothing for text without entries', () => {
        expect(parseBibtex('just some notes')).toEqual([]);
    });

    it('should report an undefined macro with its position', () => {
        expect(() => parseBibtex('@article{k, journal = nope}')).toThrow(
            'Undefined macro "nope" (line 1, column 23)'
        );
    });

    it('should report unbalanced braces at the opening brace', () => {
        try {
            parseBibtex('\n@article{k,\n  title = {open\n');
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(BibtexParseError);
            if (error instanceof BibtexParseError) {
                expect([error.line, error.column]).toEqual([3, 11]);
            }
        }
    });

    it('should reject repeated keys and repeated fields', () => {
        expect(() => parseBibtex('@misc{a, year = 1}\n@misc{a, year = 2}')).toThrow('Repeated entry key "a"');
        expect(() => parseBibtex('@misc{a, year = 1, Year = 2}')).toThrow('Repeated field "year" in entry "a"');
    });

    it('should format an entry back to BibTeX', () => {
        expect(formatBibtexEntry({ key: 'k', type: 'misc', fields: { title: 'T', year: '2001' } })).toBe(
            '@misc{k,\n  title = {T},\n  year = {2001}\n}'
        );
    });
});

describe('cslTypeForBibtex', () => {
    it('should map known entry types and default the rest to "document"', () => {
        expect(cslTypeForBibtex('Article')).toBe('article-journal');
        expect(cslTypeForBibtex('frobnicate')).toBe('document');
    });
});

describe('latexToUnicode', () => {
    it('should convert accents and letter commands', () => {
        expect(latexToUnicode('{\\"u}ber')).toBe('über');
        expect(latexToUnicode('\\AA{}ngstr{\\"o}m')).toBe('Ångström');
        expect(latexToUnicode('Pe\\~{n}a')).toBe('Peña');
        expect(latexToUnicode('\\c{c}a')).toBe('ça');
    });

    it('should drop grouping braces', () => {
        expect(latexToUnicode('{IPCC}  report')).toBe('IPCC report');
    });
});

describe('BibTeX names', () => {
    it('should parse "First von Last"', () => {
        expect(parseBibtexName('Ludwig van Beethoven')).toEqual({
            given: 'Ludwig',
            particle: 'van',
            family: 'Beethoven',
            suffix: '',
            literal: null,
        });
        expect(parseBibtexName('Jane Smith')).toMatchObject({ given: 'Jane', family: 'Smith' });
    });

    it('should parse "von Last, Jr, First"', () => {
        const name = parseBibtexName('van Dyke, Jr, Peter');
        expect(name).toEqual({ given: 'Peter', particle: 'van', family: 'Dyke', suffix: 'Jr', literal: null });
        expect(renderAlias(name)).toBe('van Dyke, Jr, Peter');
        expect(citationSurname(name)).toBe('van Dyke');
        expect(personFields(name)).toEqual({ given_names: 'Peter', last_name: 'van Dyke', suffix: 'Jr' });
    });

    it('should keep a braced name whole', () => {
        const name = parseBibtexName('{IPCC}');
        expect(name.family).toBe('IPCC');
        expect(renderAlias(name)).toBe('IPCC');
    });

    it('should convert LaTeX in name parts', () => {
        expect(renderAlias(parseBibtexName('M{\\"u}ller, J{\\"o}rg'))).toBe('Müller, Jörg');
    });

    it('should reject names with too many commas', () => {
        expect(() => parseBibtexName('a, b, c, d')).toThrow(ValidationError);
    });

    it('should split lists on "and" outside braces and drop "others"', () => {
        expect(splitBibtexNames('{Barnes and Noble} and Doe, J.')).toEqual(['{Barnes and Noble}', 'Doe, J.']);
        expect(parseBibtexNames('Smith, Jane and others').map(renderAlias)).toEqual(['Smith, Jane']);
    });
});

describe('CSL names', () => {
    it('should map particles and literals', () => {
        const name = cslNameToPersonName({ family: 'Dyke', given: 'Peter', 'non-dropping-particle': 'van' });
        expect(renderAlias(name)).toBe('van Dyke, Peter');
        expect(renderAlias(cslNameToPersonName({ literal: 'IPCC' }))).toBe('IPCC');
        expect(personFields(cslNameToPersonName({ literal: 'IPCC' }))).toEqual({
            given_names: '',
            last_name: 'IPCC',
            suffix: '',
        });
    });

    it('should reject a name without family name or literal', () => {
        expect(() => cslNameToPersonName({ given: 'Jane' })).toThrow(ValidationError);
    });
});
