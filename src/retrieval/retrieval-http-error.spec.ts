import { HttpException } from '@nestjs/common';
import { toAnswerResponse } from './dto/answer-response.dto';
import { ConfigError, StoreError, SubQuestionRetrievalError } from './errors/retrieval-errors';
import { toHttpException } from './retrieval-http-error';

describe('toHttpException', () => {
  it('maps a sub-question failure to 502 with its stage', () => {
    const error = new SubQuestionRetrievalError('q', 'store', 'boom');
    const exception = toHttpException(error);

    expect(exception).toBeInstanceOf(HttpException);
    expect(exception instanceof HttpException && exception.getStatus()).toBe(502);
    expect(exception instanceof HttpException && exception.getResponse()).toEqual({
      statusCode: 502,
      message: 'Retrieval failed for sub-question "q" at stage store: boom',
      stage: 'store',
      subQuestion: 'q',
    });
  });

  it('maps configuration faults to 500', () => {
    const exception = toHttpException(new ConfigError('QDRANT_URL is required'));
    expect(exception instanceof HttpException && exception.getStatus()).toBe(500);
  });

  it('omits the sub-question for other stages', () => {
    const exception = toHttpException(new StoreError('timeout'));
    expect(exception instanceof HttpException && exception.getResponse()).toEqual({
      statusCode: 502,
      message: 'Vector store operation failed: timeout',
      stage: 'store',
    });
  });

  it('passes other errors through', () => {
    const error = new TypeError('unexpected');
    expect(toHttpException(error)).toBe(error);
  });
});

describe('toAnswerResponse', () => {
  it('renames fields and fills absent ones with null', () => {
    expect(
      toAnswerResponse({
        answer: 'Five litres.',
        subQuestions: [],
        references: {
          tables: [{ subQuestion: 'q', elementId: 'table-2-1', pageNumber: 2, pngFile: 'a.png' }],
          figures: [{ subQuestion: 'q', label: 'figure-1-1' }],
        },
      }),
    ).toEqual({
      answer: 'Five litres.',
      references: {
        tables: [
          {
            sub_question: 'q',
            element_id: 'table-2-1',
            page_number: 2,
            png_file: 'a.png',
            html_file: null,
          },
        ],
        figures: [{ sub_question: 'q', label: 'figure-1-1', page_number: null, png_file: null }],
      },
    });
  });
});
