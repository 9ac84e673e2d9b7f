import { UnprocessableEntityException } from '@nestjs/common';
import { Test } from '@nestjs/testing';

import { NoAnalyzableContentError } from '../common/errors/originality.errors';
import { OriginalityController } from './originality.controller';
import { OriginalityService } from './originality.service';

describe('OriginalityController', () => {
  async function setup(analyze: () => Promise<never>) {
    const moduleRef = await Test.createTestingModule({
      controllers: [OriginalityController],
      providers: [{ provide: OriginalityService, useValue: { analyze: jest.fn(analyze) } }],
    }).compile();
    return moduleRef.get(OriginalityController);
  }

  const dto = { submission_id: 'sub-1', author_id: 'author-1', files: [{ file_name: 'a.txt', text: '' }] };

  it('should answer 422 with the skipped files when nothing is analyzable', async () => {
    const controller = await setup(async () => {
      throw new NoAnalyzableContentError([{ fileName: 'a.txt', reason: 'empty text' }]);
    });

    const analysis = controller.analyze(dto);

    await expect(analysis).rejects.toBeInstanceOf(UnprocessableEntityException);
    await expect(analysis).rejects.toMatchObject({
      response: {
        message: 'Submission contains no analyzable content.',
        unanalyzable_units: [{ file_name: 'a.txt', reason: 'empty text' }],
      },
    });
  });

  it('should pass other errors through', async () => {
    const controller = await setup(async () => {
      throw new Error('database down');
    });

    await expect(controller.analyze(dto)).rejects.toThrow('database down');
  });
});
