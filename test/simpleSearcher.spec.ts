import { SimpleSearcher } from '../src/services/guide/simpleSearcher';
import { makeChunk } from './testStore';

describe('SimpleSearcher', () => {
  test('scores by distinct keyword hits with the group multiplier', () => {
    const guide = makeChunk('Burn team guide');
    const notes = makeChunk('burn notes', { groupId: 'g1' });
    const searcher = new SimpleSearcher([notes, guide]);

    const results = searcher.search('Burn guide burn', 6, 'g1');
    expect(results.map((r) => [r.id, r.score])).toEqual([
      [guide.id, 2],
      [notes.id, 1.2],
    ]);
  });

  test('applies aliases before splitting', () => {
    const chunk = makeChunk('洪鹿攻略');
    const searcher = new SimpleSearcher([chunk], new Map([['红叔', '洪鹿']]));
    expect(searcher.search('红叔').map((r) => r.id)).toEqual([chunk.id]);
  });

  test('empty corpus and no matches', () => {
    expect(new SimpleSearcher().search('burn')).toEqual([]);
    expect(new SimpleSearcher([makeChunk('bleed')]).search('burn')).toEqual([]);
  });

  test('searchAsync matches search and honours topK', async () => {
    const searcher = new SimpleSearcher([makeChunk('burn a'), makeChunk('burn b')]);
    expect(await searcher.searchAsync('burn', 1)).toEqual(searcher.search('burn', 1));
    expect(searcher.search('burn', 1)).toHaveLength(1);
  });

  test('updateChunks replaces the corpus', () => {
    const searcher = new SimpleSearcher([makeChunk('burn')]);
    searcher.updateChunks([]);
    expect(searcher.size).toBe(0);
    expect(searcher.search('burn')).toEqual([]);
  });
});
