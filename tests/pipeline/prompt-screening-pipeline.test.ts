import sinon from 'sinon';
import { expect } from 'chai';
import { AxiosError } from 'axios';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import {
  CategoryResolver,
  CsvPromptSink,
  CsvPromptSource,
  LlmBaseModel,
  LlmTransportError,
  OllamaCategoryClassifier,
  OllamaInstanceConfig,
  OllamaModelConfig,
  PromptScreeningPipeline,
  SourceFormatError,
  SourceNotFoundError,
  createSeededRandom,
  fallbackCategorize,
  loadScreenerConfig,
  readCategorizedPrompts,
  type CategoryClassifier,
  type PromptRecord,
} from '#prompt-screener';
import { InMemoryPromptSink, InMemoryPromptSource } from '../utils/in-memory-prompt-source.js';
import {
  fakeCaseNumberPrompt,
  fakeNoKeywordPrompt,
  fakeStudyPrompt,
  fakeTaxonomy,
  fakeTutorPrompt,
} from '../stubs/prompts.stub.js';

function createClassifier(answer: (prompt: PromptRecord) => Promise<string>) {
  const classify = sinon.stub<Parameters<CategoryClassifier['classify']>, Promise<string>>()
    .callsFake((prompt) => answer(prompt));
  const classifier: CategoryClassifier = { classify };
  return { classifier, classify };
}

describe('Prompt Screening Pipeline', () => {
  afterEach(() => {
    sinon.restore();
  });

  it('should drop PII prompts and categorize the rest in input order', async () => {
    // Arrange
    const source = new InMemoryPromptSource({
      prompts: [fakeTutorPrompt, fakeCaseNumberPrompt, fakeStudyPrompt],
      taxonomy: fakeTaxonomy,
    });
    const sink = new InMemoryPromptSink();
    const { classifier, classify } = createClassifier(async () => 'Educational Support, Not A Category');
    const pipeline = new PromptScreeningPipeline({ source, sink, resolver: new CategoryResolver({ classifier }) });

    // Act
    const result = await pipeline.run();

    // Assert
    sinon.assert.calledTwice(classify);
    expect(result).to.deep.equal({
      status: 'success',
      kept: { total: 2, names: ['Tutor', 'Study Buddy'] },
      filtered: { total: 1, names: ['Case Intake'] },
      failed: { total: 0, names: [] },
    });
    expect(sink.records).to.deep.equal([
      { ...fakeTutorPrompt, category_1: 'Educational Support', category_2: '', category_3: '' },
      { ...fakeStudyPrompt, category_1: 'Educational Support', category_2: '', category_3: '' },
    ]);
  });

  it('should fill three slots with taxonomy members for every kept prompt', async () => {
    // Arrange
    const prompts: PromptRecord[] = [
      { name: 'Counsel', description: 'Legal and business advisor', system_prompt: 'Offer technical support.' },
      { name: 'Guide', description: 'Travel writer', system_prompt: 'Help me explore.' },
      { name: 'Blank', description: 'Nothing', system_prompt: 'Quiet.' },
    ];
    const source = new InMemoryPromptSource({ prompts, taxonomy: fakeTaxonomy });
    const sink = new InMemoryPromptSink();
    const { classifier } = createClassifier(async () => '');
    const pipeline = new PromptScreeningPipeline({
      source,
      sink,
      resolver: new CategoryResolver({ classifier, random: () => 0 }),
    });

    // Act
    await pipeline.run();

    // Assert
    expect(sink.records).to.have.length(3);
    for (const record of sink.records) {
      expect(record).to.have.all.keys('name', 'description', 'system_prompt', 'category_1', 'category_2', 'category_3');
      for (const slot of [record.category_1, record.category_2, record.category_3]) {
        if (slot !== '') {
          expect(fakeTaxonomy).to.include(slot);
        }
      }
    }
    expect(sink.records[2]?.category_1).to.equal('Professional Services');
  });

  it('should invoke the PII callback with each filtered prompt', async () => {
    // Arrange
    const source = new InMemoryPromptSource({
      prompts: [fakeCaseNumberPrompt, fakeTutorPrompt],
      taxonomy: fakeTaxonomy,
    });
    const { classifier } = createClassifier(async () => 'Educational Support');
    const pipeline = new PromptScreeningPipeline({
      source,
      sink: new InMemoryPromptSink(),
      resolver: new CategoryResolver({ classifier }),
    });
    const callback = sinon.stub<[PromptRecord], void>();
    pipeline.add_pii_filtered_callback(callback);

    // Act
    await pipeline.run();

    // Assert
    sinon.assert.calledOnceWithExactly(callback, fakeCaseNumberPrompt);
  });

  it('should count a filtered prompt once when the PII callback throws', async () => {
    // Arrange
    const source = new InMemoryPromptSource({
      prompts: [fakeCaseNumberPrompt, fakeTutorPrompt],
      taxonomy: fakeTaxonomy,
    });
    const sink = new InMemoryPromptSink();
    const { classifier } = createClassifier(async () => 'Educational Support');
    const pipeline = new PromptScreeningPipeline({ source, sink, resolver: new CategoryResolver({ classifier }) });
    pipeline.add_pii_filtered_callback(() => {
      throw new Error('callback exploded');
    });
    sinon.stub(pipeline.log, 'error');

    // Act
    const result = await pipeline.run();

    // Assert
    expect(result).to.deep.equal({
      status: 'success',
      kept: { total: 1, names: ['Tutor'] },
      filtered: { total: 1, names: ['Case Intake'] },
      failed: { total: 0, names: [] },
    });
    expect(sink.records.map((record) => record.name)).to.deep.equal(['Tutor']);
  });

  it('should warn about fallback labels missing from the taxonomy and still assign them', async () => {
    // Arrange
    const counsel: PromptRecord = {
      name: 'Counsel',
      description: 'Legal and business advisor',
      system_prompt: 'Offer technical support.',
    };
    const source = new InMemoryPromptSource({ prompts: [counsel], taxonomy: ['Educational Support'] });
    const sink = new InMemoryPromptSink();
    const { classifier } = createClassifier(async () => '');
    const pipeline = new PromptScreeningPipeline({ source, sink, resolver: new CategoryResolver({ classifier }) });
    const warn = sinon.stub(pipeline.log, 'warn');

    // Act
    await pipeline.run();

    // Assert
    expect(warn.getCalls().map((call) => call.args[0])).to.deep.equal([
      { msg: "Fallback category 'Professional Services' is not in the loaded taxonomy", category: 'Professional Services' },
      { msg: "Fallback category 'Personal Assistance' is not in the loaded taxonomy", category: 'Personal Assistance' },
      {
        msg: "Fallback category 'Creative and Exploratory' is not in the loaded taxonomy",
        category: 'Creative and Exploratory',
      },
    ]);
    expect(sink.records).to.deep.equal([
      { ...counsel, category_1: 'Professional Services', category_2: '', category_3: '' },
    ]);
  });

  it('should not warn when the taxonomy holds every fallback label', async () => {
    const source = new InMemoryPromptSource({ prompts: [fakeTutorPrompt], taxonomy: fakeTaxonomy });
    const { classifier } = createClassifier(async () => 'Educational Support');
    const pipeline = new PromptScreeningPipeline({
      source,
      sink: new InMemoryPromptSink(),
      resolver: new CategoryResolver({ classifier }),
    });
    const warn = sinon.stub(pipeline.log, 'warn');

    await pipeline.run();

    sinon.assert.notCalled(warn);
  });

  it('should keep going when one prompt fails', async () => {
    // Arrange
    const broken: PromptRecord = { name: 'Broken', description: 'Fails', system_prompt: 'Always fails.' };
    const source = new InMemoryPromptSource({ prompts: [broken, fakeTutorPrompt], taxonomy: fakeTaxonomy });
    const sink = new InMemoryPromptSink();
    const { classifier } = createClassifier(async (prompt) => {
      if (prompt.name === 'Broken') {
        throw new Error('classifier exploded');
      }
      return 'Educational Support';
    });
    const pipeline = new PromptScreeningPipeline({ source, sink, resolver: new CategoryResolver({ classifier }) });

    // Act
    const result = await pipeline.run();

    // Assert
    expect(result.failed).to.deep.equal({ total: 1, names: ['Broken'] });
    expect(result.kept).to.deep.equal({ total: 1, names: ['Tutor'] });
    expect(sink.records.map((record) => record.name)).to.deep.equal(['Tutor']);
  });

  it('should abort before writing when an input cannot be loaded', async () => {
    // Arrange
    const source = new InMemoryPromptSource({ prompts: [fakeTutorPrompt], taxonomy: fakeTaxonomy });
    sinon.stub(source, 'loadPrompts').rejects(new SourceNotFoundError(404, 'File not found: system_prompts.csv'));
    const sink = new InMemoryPromptSink();
    const writeSpy = sinon.spy(sink, 'write');
    const { classifier } = createClassifier(async () => 'Educational Support');
    const pipeline = new PromptScreeningPipeline({ source, sink, resolver: new CategoryResolver({ classifier }) });

    // Act
    const error = await pipeline.run().then(() => null, (e: unknown) => e);

    // Assert
    expect(error).to.be.instanceOf(SourceNotFoundError);
    sinon.assert.notCalled(writeSpy);
  });

  it('should abort before writing when the taxonomy is empty', async () => {
    // Arrange
    const source = new InMemoryPromptSource({ prompts: [fakeTutorPrompt], taxonomy: [] });
    const sink = new InMemoryPromptSink();
    const writeSpy = sinon.spy(sink, 'write');
    const { classifier, classify } = createClassifier(async () => '');
    const pipeline = new PromptScreeningPipeline({ source, sink, resolver: new CategoryResolver({ classifier }) });

    // Act
    const error = await pipeline.run().then(() => null, (e: unknown) => e);

    // Assert
    expect(error).to.be.instanceOf(SourceFormatError);
    sinon.assert.notCalled(classify);
    sinon.assert.notCalled(writeSpy);
  });

  it('should write an empty table when every prompt is filtered', async () => {
    const source = new InMemoryPromptSource({ prompts: [fakeCaseNumberPrompt], taxonomy: fakeTaxonomy });
    const sink = new InMemoryPromptSink();
    const { classifier } = createClassifier(async () => 'Educational Support');
    const pipeline = new PromptScreeningPipeline({ source, sink, resolver: new CategoryResolver({ classifier }) });

    const result = await pipeline.run();

    expect(result.kept.total).to.equal(0);
    expect(sink.records).to.deep.equal([]);
  });
});

describe('Prompt Screening Pipeline with CSV files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'prompt-screener-'));
  });

  afterEach(async () => {
    sinon.restore();
    await rm(dir, { recursive: true, force: true });
  });

  it('should write only the clean prompt, categorized by the fallback, when Ollama is unreachable', async () => {
    // Arrange
    await writeFile(
      path.join(dir, 'system_prompts.csv'),
      [
        'name,description,system_prompt',
        'Case Intake,Records the case number 12345,Log details.',
        'Study Buddy,A tutor for exams,Quiz the user.',
        '',
      ].join('\n')
    );
    await writeFile(path.join(dir, 'categories.csv'), 'category\nEducational Support\nProfessional Services\n');
    await writeFile(path.join(dir, 'pii.txt'), '# patterns\ncase number\n');
    const outputFile = path.join(dir, 'cleaned_prompts.csv');

    const classifier = new OllamaCategoryClassifier({
      instanceConfig: new OllamaInstanceConfig({ apiUrl: 'http://localhost:11434/api/generate' }),
      modelConfig: new OllamaModelConfig(),
    });
    const postStub = sinon.stub(classifier.http, 'post')
      .rejects(new AxiosError('connect ECONNREFUSED 127.0.0.1:11434', 'ECONNREFUSED'));

    const pipeline = new PromptScreeningPipeline({
      source: new CsvPromptSource({
        promptsFile: path.join(dir, 'system_prompts.csv'),
        categoriesFile: path.join(dir, 'categories.csv'),
        piiFile: path.join(dir, 'pii.txt'),
      }),
      sink: new CsvPromptSink(outputFile),
      resolver: new CategoryResolver({ classifier }),
    });

    // Act
    const result = await pipeline.run();

    // Assert
    sinon.assert.calledOnce(postStub);
    expect(result.filtered).to.deep.equal({ total: 1, names: ['Case Intake'] });
    expect(await readCategorizedPrompts(outputFile)).to.deep.equal([
      {
        name: 'Study Buddy',
        description: 'A tutor for exams',
        system_prompt: 'Quiz the user.',
        category_1: 'Educational Support',
        category_2: '',
        category_3: '',
      },
    ]);
  });

  it('should pick the same random category on every run with the same seed', async () => {
    // Arrange
    const taxonomy = ['Alpha', 'Beta', 'Gamma', 'Delta', 'Epsilon'];
    await writeFile(
      path.join(dir, 'system_prompts.csv'),
      `name,description,system_prompt\n${fakeNoKeywordPrompt.name},${fakeNoKeywordPrompt.description},${fakeNoKeywordPrompt.system_prompt}\n`
    );
    await writeFile(path.join(dir, 'categories.csv'), `category\n${taxonomy.join('\n')}\n`);
    await writeFile(path.join(dir, 'pii.txt'), 'ssn\n');
    sinon.stub(LlmBaseModel.prototype, 'modelInvoke')
      .rejects(new LlmTransportError(503, 'connect ECONNREFUSED 127.0.0.1:11434'));

    const runWithSeed = async (output: string) => {
      const config = loadScreenerConfig({}, {
        prompts: path.join(dir, 'system_prompts.csv'),
        categories: path.join(dir, 'categories.csv'),
        pii: path.join(dir, 'pii.txt'),
        output: path.join(dir, output),
        seed: 42,
      });
      await PromptScreeningPipeline.fromConfig(config).run();
      return readCategorizedPrompts(path.join(dir, output));
    };

    // Act
    const first = await runWithSeed('first.csv');
    const second = await runWithSeed('second.csv');

    // Assert
    const [expected] = fallbackCategorize(fakeNoKeywordPrompt, taxonomy, createSeededRandom(42));
    expect(first.map((record) => record.category_1)).to.deep.equal([expected]);
    expect(second).to.deep.equal(first);
  });
});
