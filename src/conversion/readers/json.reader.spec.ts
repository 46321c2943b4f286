import { FormatError, ShapeError } from '../interfaces/conversion-error';
import { collectError, collectRows } from '../../../test/utils/test-helpers';
import { JsonReader } from './json.reader';

describe('JsonReader', () => {
  let reader: JsonReader;

  const read = (text: string) =>
    collectRows(reader.read(Buffer.from(text, 'utf-8'), 'json'));

  beforeEach(() => {
    reader = new JsonReader();
  });

  it('should read a top-level array, keeping scalar types', async () => {
    await expect(
      read('[{"meter":"M-1","value":12.5,"estimated":true,"note":null}]'),
    ).resolves.toEqual([
      { meter: 'M-1', value: 12.5, estimated: true, note: null },
    ]);
  });

  it('should carry nested values as JSON text', async () => {
    await expect(
      read('[{"meter":"M-1","tags":["a","b"],"geo":{"lat":1}}]'),
    ).resolves.toEqual([
      { meter: 'M-1', tags: '["a","b"]', geo: '{"lat":1}' },
    ]);
  });

  it('should read the readings member of an object', async () => {
    await expect(
      read('{"exported":"2026-01-01","readings":[{"meter":"M-2"}]}'),
    ).resolves.toEqual([{ meter: 'M-2' }]);
  });

  it('should report the first record keys as headers', async () => {
    const onHeaders = jest.fn();

    await collectRows(
      reader.read(
        Buffer.from('[{"meter":"M-1","value":1},{"other":2}]', 'utf-8'),
        'json',
        onHeaders,
      ),
    );

    expect(onHeaders).toHaveBeenCalledTimes(1);
    expect(onHeaders).toHaveBeenCalledWith(['meter', 'value']);
  });

  it('should ignore a byte order mark', async () => {
    await expect(read('\uFEFF[]')).resolves.toEqual([]);
  });

  it.each(['42', '"text"', '{"items":[]}', '{"readings":{}}', 'null'])(
    'should reject %s as not list-shaped',
    async (text) => {
      const error = await collectError(
        reader.read(Buffer.from(text, 'utf-8'), 'json'),
      );

      expect(error).toBeInstanceOf(ShapeError);
      expect(error).toHaveProperty(
        'message',
        'JSON content must be a list of rows or an object with a "readings" list',
      );
    },
  );

  it('should name the first element that is not an object', async () => {
    await expect(read('[{}, [], 3]')).rejects.toThrow(
      'JSON row 2 is not an object',
    );
  });

  it('should reject text that is not JSON', async () => {
    const error = await collectError(
      reader.read(Buffer.from('{bad', 'utf-8'), 'json'),
    );

    expect(error).toBeInstanceOf(FormatError);
    expect(error).toHaveProperty(
      'message',
      expect.stringMatching(/^Invalid JSON: /),
    );
  });
});
