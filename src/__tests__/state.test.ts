import { END, START, StateGraph } from '@langchain/langgraph';
import { StateOverwriteError } from '../core/errors';
import { GraphStateAnnotation, appendReducer, writeOnceReducer } from '../graph/state';

describe('writeOnceReducer', () => {
  const answer = writeOnceReducer<string>('answer');

  test('the first write lands and an empty update keeps it', () => {
    expect(answer(null, 'Container CAIU1234567 is IN_OCEAN.')).toBe('Container CAIU1234567 is IN_OCEAN.');
    expect(answer('first', null)).toBe('first');
  });

  test('an equal second write is accepted', () => {
    const route = writeOnceReducer<{ kind: string }>('route');
    const current = { kind: 'analytics' };
    expect(route(current, { kind: 'analytics' })).toBe(current);
  });

  test('a different second write is refused', () => {
    expect(() => answer('first', 'second')).toThrow(StateOverwriteError);
    expect(() => answer('first', 'second')).toThrow('Stage attempted to overwrite "answer"');
  });
});

describe('appendReducer', () => {
  test('keeps earlier entries and adds the new ones', () => {
    expect(appendReducer(['a'], ['b', 'c'])).toEqual(['a', 'b', 'c']);
  });
});

describe('GraphStateAnnotation', () => {
  test('notices from successive stages accumulate', async () => {
    const graph = new StateGraph(GraphStateAnnotation)
      .addNode('first', () => ({
        answer: 'same',
        notices: [{ code: 'context-reset' as const, message: 'reset' }],
      }))
      .addNode('second', () => ({
        answer: 'same',
        notices: [{ code: 'no-matching-shipments' as const, message: 'none' }],
      }))
      .addEdge(START, 'first')
      .addEdge('first', 'second')
      .addEdge('second', END)
      .compile();

    const state = await graph.invoke({ question: 'where is caiu1234567' });

    expect(state.answer).toBe('same');
    expect(state.notices.map(notice => notice.code)).toEqual(['context-reset', 'no-matching-shipments']);
  });
});
