import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createHash } from 'crypto';
import { loadDataset, parseCsvRecords, parseDataset } from '../../../services/data/DatasetLoader';
import { ConfigError } from '../../../types/ModelGateErrors';

describe('DatasetLoader', () => {
  describe('parseCsvRecords', () => {
    it('handles quoted fields, escaped quotes and CRLF line endings', () => {
      const content = 'name,comment\r\n"Smith, J","said ""hi"""\r\nLee,plain\r\n';
      expect(parseCsvRecords(content)).toEqual([
        ['name', 'comment'],
        ['Smith, J', 'said "hi"'],
        ['Lee', 'plain'],
      ]);
    });

    it('keeps newlines inside quotes and drops blank lines', () => {
      expect(parseCsvRecords('a,b\n\n"x\ny",2\n\n')).toEqual([
        ['a', 'b'],
        ['x\ny', '2'],
      ]);
    });

    it('reads a last record without a trailing newline', () => {
      expect(parseCsvRecords('a,b\n1,')).toEqual([
        ['a', 'b'],
        ['1', ''],
      ]);
    });
  });

  describe('parseDataset', () => {
    it('drops index columns and trims values', () => {
      const content = ',tenure,Unnamed: 0,label\n0, 12 ,7,1\n1,3,8, 0\n';
      const dataset = parseDataset(content, 'train.csv');

      expect(dataset.columns).toEqual(['tenure', 'label']);
      expect(dataset.rows).toEqual([
        { tenure: '12', label: '1' },
        { tenure: '3', label: '0' },
      ]);
      expect(dataset.source).toBe('train.csv');
      expect(dataset.digest).toBe(createHash('sha256').update(content).digest('hex'));
    });

    it('rejects rows with the wrong number of fields', () => {
      expect(() => parseDataset('a,b\n1,2\n3\n', 'bad.csv')).toThrow('Dataset row 3 has 1 fields, expected 2: bad.csv');
    });

    it('rejects empty content', () => {
      expect(() => parseDataset('', 'empty.csv')).toThrow('Dataset is empty: empty.csv');
    });

    it('gives identical content the same digest', () => {
      expect(parseDataset('a\n1\n', 'x.csv').digest).toBe(parseDataset('a\n1\n', 'y.csv').digest);
      expect(parseDataset('a\n1\n', 'x.csv').digest).not.toBe(parseDataset('a\n2\n', 'x.csv').digest);
    });
  });

  describe('loadDataset', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'model-gate-data-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('loads a CSV file', () => {
      const file = path.join(tmpDir, 'eval.csv');
      fs.writeFileSync(file, 'score,label\n1,1\n');
      const dataset = loadDataset(file);
      expect(dataset.rows).toEqual([{ score: '1', label: '1' }]);
      expect(dataset.source).toBe(file);
    });

    it('rejects a missing path, a missing file and other formats', () => {
      expect(() => loadDataset('')).toThrow(ConfigError);
      expect(() => loadDataset(path.join(tmpDir, 'absent.csv'))).toThrow(/Dataset not found/);
      expect(() => loadDataset(path.join(tmpDir, 'data.parquet'))).toThrow(/expected \.csv/);
    });
  });
});
