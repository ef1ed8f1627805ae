import { ConfigService } from '@nestjs/config';
import { FakeListChatModel } from '@langchain/core/utils/testing';
import { QueryDecompositionError } from '../errors/retrieval-errors';
import { LLMProviderFactory } from '../providers/llm-provider.factory';
import { loadManualStructure, type ManualStructure } from './manual-structure';
import {
  QueryDecompositionService,
  parseDecomposition,
  stripCodeFences,
} from './query-decomposition.service';

const structure: ManualStructure = [
  { section: 2, title: 'General Information', chapters: ['Specifications', 'Torque Charts'] },
  { section: 3, title: 'Boom', chapters: ['Boom Wear Pads'] },
];

function entry(subQuestion: string, section: number, chapters: string[] = []) {
  return {
    sub_question: subQuestion,
    section_number: section,
    section_title: 'whatever the model wrote',
    matched_chapters: chapters,
  };
}

describe('stripCodeFences', () => {
  it('unwraps a fenced block', () => {
    expect(stripCodeFences('```json\n[1, 2]\n```')).toBe('[1, 2]');
  });

  it('leaves plain text alone', () => {
    expect(stripCodeFences('  [1]  ')).toBe('[1]');
  });
});

describe('parseDecomposition', () => {
  it('anchors entries to the canonical section and known chapters', () => {
    const text = JSON.stringify([entry('What torque for the boom bolts?', 2, ['Torque Charts', 'Made Up'])]);

    expect(parseDecomposition(text, structure)).toEqual({
      mappings: [
        {
          subQuestion: 'What torque for the boom bolts?',
          sectionNumber: 2,
          sectionTitle: 'General Information',
          matchedChapters: ['Torque Charts'],
        },
      ],
      dropped: [],
    });
  });

  it('drops entries with unknown sections or missing fields', () => {
    const text = JSON.stringify([
      entry('Valid?', 3),
      entry('Unknown section?', 42),
      { section_number: 2 },
    ]);

    const { mappings, dropped } = parseDecomposition(text, structure);
    expect(mappings.map((mapping) => mapping.subQuestion)).toEqual(['Valid?']);
    expect(dropped).toEqual(['entry 1: unknown section 42', 'entry 2: malformed']);
  });

  it('keeps at most four sub-questions', () => {
    const text =
      '```json\n' +
      JSON.stringify(['a', 'b', 'c', 'd', 'e'].map((question) => entry(question, 2))) +
      '\n```';

    const { mappings, dropped } = parseDecomposition(text, structure);
    expect(mappings.map((mapping) => mapping.subQuestion)).toEqual(['a', 'b', 'c', 'd']);
    expect(dropped).toEqual(['1 entries over the limit']);
  });

  it('accepts the wrapped object form', () => {
    const text = JSON.stringify({ decomposed_questions: [entry('Wrapped?', 3)] });
    expect(parseDecomposition(text, structure).mappings).toHaveLength(1);
  });

  it('rejects invalid JSON', () => {
    expect(() => parseDecomposition('not json', structure)).toThrow(QueryDecompositionError);
  });

  it('rejects JSON that is not a list', () => {
    expect(() => parseDecomposition('{"foo": 1}', structure)).toThrow(
      'Query decomposition failed: response is not a JSON array of sub-questions',
    );
  });
});

describe('loadManualStructure', () => {
  it('loads the bundled structure', () => {
    const bundled = loadManualStructure();
    expect(bundled).toHaveLength(9);
    expect(bundled[0].title).toBe('Safety Practices');
  });

  it('reports an unreadable file as a configuration error', () => {
    expect(() => loadManualStructure('/nonexistent/structure.json')).toThrow(
      'Invalid configuration: cannot read manual structure from /nonexistent/structure.json',
    );
  });
});

describe('QueryDecompositionService', () => {
  function createService(responses: string[], env: Record<string, string> = {}) {
    const configService = new ConfigService({ DECOMPOSITION_PROVIDER: 'openai', ...env });
    const llmFactory = new LLMProviderFactory(configService);
    const createChatModel = jest
      .spyOn(llmFactory, 'createChatModel')
      .mockReturnValue(new FakeListChatModel({ responses }));
    return {
      service: new QueryDecompositionService(configService, llmFactory, structure),
      createChatModel,
    };
  }

  it('returns the parsed sub-questions', async () => {
    const { service, createChatModel } = createService([
      JSON.stringify([entry('Which wear pads fit?', 3, ['Boom Wear Pads'])]),
    ]);

    await expect(service.decompose('How do I replace the wear pads?')).resolves.toEqual([
      {
        subQuestion: 'Which wear pads fit?',
        sectionNumber: 3,
        sectionTitle: 'Boom',
        matchedChapters: ['Boom Wear Pads'],
      },
    ]);
    expect(createChatModel).toHaveBeenCalledWith('openai', {
      model: undefined,
      temperature: 0,
      maxTokens: 1024,
      maxRetries: 0,
    });
  });

  it('fails when no entry survives validation', async () => {
    const { service } = createService([JSON.stringify([entry('Nowhere?', 99)])]);

    await expect(service.decompose('question')).rejects.toThrow(
      'Query decomposition failed: no valid sub-questions in response',
    );
  });

  it('fails when the model is slower than the stage timeout', async () => {
    const configService = new ConfigService({ DECOMPOSITION_TIMEOUT_MS: '10' });
    const llmFactory = new LLMProviderFactory(configService);
    jest
      .spyOn(llmFactory, 'createChatModel')
      .mockReturnValue(new FakeListChatModel({ responses: ['[]'], sleep: 200 }));
    const service = new QueryDecompositionService(configService, llmFactory, structure);

    await expect(service.decompose('question')).rejects.toThrow(QueryDecompositionError);
  });
});
