import { describe, it, expect } from 'vitest';

import { parseSheetReferences, resolveSheetPath } from '../src/schematic-sheets.js';

const ROOT_SCHEMATIC = `(kicad_sch (version 20231120) (generator "eeschema")
  (uuid "5b4c0f6e-0000-4000-8000-000000000001")
  (paper "A4")
  (text "Note: (sheet \\"fake\\") is only text"
    (at 20 20 0)
  )
  (sheet (at 50.8 38.1) (size 25.4 12.7)
    (uuid "5b4c0f6e-0000-4000-8000-000000000002")
    (property "Sheetname" "Power (5V)" (at 50.8 37.4 0))
    (property "Sheetfile" "power.kicad_sch" (at 50.8 51.4 0))
    (pin "VIN" input (at 50.8 43.2 180))
  )
  (sheet (at 101.6 38.1) (size 25.4 12.7)
    (property "Sheet name" "IO")
    (property "Sheet file" "sheets/io.kicad_sch")
  )
)
`;

describe('schematic-sheets', () => {
  describe('parseSheetReferences', () => {
    it('should list sheets in file order with both property spellings', () => {
      expect(parseSheetReferences(ROOT_SCHEMATIC)).toEqual([
        { name: 'Power (5V)', file: 'power.kicad_sch' },
        { name: 'IO', file: 'sheets/io.kicad_sch' },
      ]);
    });

    it('should return nothing for a schematic without sheets', () => {
      expect(parseSheetReferences('(kicad_sch (version 20231120) (paper "A4"))')).toEqual([]);
    });

    it('should unescape quoted values', () => {
      const source = '(kicad_sch (sheet (property "Sheetname" "say \\"hi\\"") (property "Sheetfile" "hi.kicad_sch")))';

      expect(parseSheetReferences(source)).toEqual([{ name: 'say "hi"', file: 'hi.kicad_sch' }]);
    });

    it('should fall back to the file stem when the sheet has no name', () => {
      const source = '(kicad_sch (sheet (property "Sheetfile" "sub/adc.kicad_sch")))';

      expect(parseSheetReferences(source)).toEqual([{ name: 'adc', file: 'sub/adc.kicad_sch' }]);
    });

    it('should not mistake sheet_instances for a sheet', () => {
      const source = '(kicad_sch (sheet_instances (path "/" (page "1"))))';

      expect(parseSheetReferences(source)).toEqual([]);
    });

    it('should reject legacy and truncated files', () => {
      expect(() => parseSheetReferences('EESchema Schematic File Version 4')).toThrow(SyntaxError);
      expect(() => parseSheetReferences('(kicad_sch (sheet (property "Sheetfile" "a.kicad_sch")')).toThrow(
        'Unterminated sheet list'
      );
      expect(() => parseSheetReferences('(kicad_sch (sheet (property "Sheetname" "a")))')).toThrow(
        'Sheet without a file property'
      );
    });
  });

  describe('resolveSheetPath', () => {
    it('should resolve relative to the referencing sheet', () => {
      expect(resolveSheetPath('amp.kicad_sch', 'power.kicad_sch')).toBe('power.kicad_sch');
      expect(resolveSheetPath('sheets/io.kicad_sch', 'adc.kicad_sch')).toBe('sheets/adc.kicad_sch');
      expect(resolveSheetPath('sheets/io.kicad_sch', '../power.kicad_sch')).toBe('power.kicad_sch');
    });

    it('should accept Windows separators', () => {
      expect(resolveSheetPath('amp.kicad_sch', 'sheets\\io.kicad_sch')).toBe('sheets/io.kicad_sch');
    });

    it('should refuse references leaving the project', () => {
      expect(resolveSheetPath('amp.kicad_sch', '../shared/power.kicad_sch')).toBeNull();
      expect(resolveSheetPath('amp.kicad_sch', '/abs/power.kicad_sch')).toBeNull();
      expect(resolveSheetPath('amp.kicad_sch', 'C:\\lib\\power.kicad_sch')).toBeNull();
    });
  });
});
