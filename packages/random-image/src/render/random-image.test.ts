import { describe, it, expect, vi, afterEach } from 'vitest';
import { resolveConfig } from '../config/config.js';
import { createFakeParser, createFakeServices } from '../test-utils/fakes.js';
import { requireTitle } from '../test-utils/titles.js';
import { RandomImage } from './random-image.js';

const config = resolveConfig();

describe('RandomImage', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('render', () => {
    it('renders the picked image without the magnifier', async () => {
      const parser = createFakeParser();
      const services = createFakeServices();

      const html = await new RandomImage(parser, services, { size: '100', float: 'left' }, null, { config }).render();

      expect(parser.recursiveTagParse).toHaveBeenCalledWith('[[File:Example.png|thumb|100px|left|A caption]]');
      expect(html).toBe(
        '<div class="thumb"><div class="thumbcaption">[[File:Example.png|thumb|100px|left|A caption]]</div></div>',
      );
    });

    it('uses the explicit caption without reading the description page', async () => {
      const parser = createFakeParser();
      const services = createFakeServices();

      await new RandomImage(parser, services, {}, 'Given caption', { config }).render();

      expect(parser.recursiveTagParse).toHaveBeenCalledWith('[[File:Example.png|thumb|Given caption]]');
      expect(services.revisions.getRevisionText).not.toHaveBeenCalled();
    });

    it('picks from the choices attribute instead of the store', async () => {
      const parser = createFakeParser();
      const services = createFakeServices();

      await new RandomImage(parser, services, { choices: 'Only one.png' }, 'Cap', { config }).render();

      expect(parser.recursiveTagParse).toHaveBeenCalledWith('[[File:Only one.png|thumb|Cap]]');
      expect(services.pages.selectRandomPage).not.toHaveBeenCalled();
    });

    it('uses the injected random source for choices', async () => {
      const parser = createFakeParser();
      const services = createFakeServices();

      await new RandomImage(parser, services, { choices: 'A.png|B.png' }, 'Cap', { config, random: () => 0.75 }).render();

      expect(parser.recursiveTagParse).toHaveBeenCalledWith('[[File:B.png|thumb|Cap]]');
    });

    it('returns an empty string when the picked file does not exist', async () => {
      const parser = createFakeParser();
      const services = createFakeServices({ files: { fileExists: vi.fn(async () => false) } });

      await expect(new RandomImage(parser, services, {}, null, { config }).render()).resolves.toBe('');
      expect(parser.recursiveTagParse).not.toHaveBeenCalled();
    });

    it('logs and rethrows host failures', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      const parser = createFakeParser();
      const services = createFakeServices({
        files: {
          fileExists: vi.fn(async () => {
            throw new Error('repository offline');
          }),
        },
      });

      await expect(new RandomImage(parser, services, {}, null, { config }).render()).rejects.toThrow(
        'repository offline',
      );
      expect(error).toHaveBeenCalledWith('[RandomImage]', 'Failed to render random image', {
        error: 'repository offline',
      });
      expect(parser.recursiveTagParse).not.toHaveBeenCalled();
    });

    it('returns an empty string when the store has no image', async () => {
      const parser = createFakeParser();
      const services = createFakeServices({ pages: { selectRandomPage: vi.fn(async () => null) } });

      await expect(new RandomImage(parser, services, {}, null, { config }).render()).resolves.toBe('');
      expect(services.pages.selectRandomPage).toHaveBeenCalledTimes(2);
    });

    it('returns an empty string for an invalid choice', async () => {
      const parser = createFakeParser();
      const services = createFakeServices();

      await expect(new RandomImage(parser, services, { choices: '{bad}' }, null, { config }).render()).resolves.toBe('');
      expect(services.files.fileExists).not.toHaveBeenCalled();
    });

    it('queries without the MIME filter when not strict', async () => {
      const parser = createFakeParser();
      const services = createFakeServices();

      await new RandomImage(parser, services, {}, 'Cap', { config: resolveConfig({ miserMode: true }) }).render();

      expect(services.pages.selectRandomPage).toHaveBeenCalledWith(
        expect.not.objectContaining({ requireMajorMime: 'image' }),
      );
    });
  });

  describe('getCaption', () => {
    it('falls back to the placeholder for a missing description page', async () => {
      const services = createFakeServices({ revisions: { pageExists: vi.fn(async () => false) } });
      const image = new RandomImage(createFakeParser(), services, {}, null, { config });

      await expect(image.getCaption(requireTitle('Example.png'))).resolves.toBe('&#32;');
    });

    it('reads the description page once', async () => {
      const services = createFakeServices();
      const image = new RandomImage(createFakeParser(), services, {}, '', { config });
      const title = requireTitle('Example.png');

      await image.getCaption(title);
      await image.getCaption(title);

      expect(services.revisions.getRevisionText).toHaveBeenCalledTimes(1);
    });
  });

  describe('buildMarkup', () => {
    it('includes the placeholder caption', async () => {
      const services = createFakeServices({ revisions: { getRevisionText: vi.fn(async () => '') } });
      const image = new RandomImage(createFakeParser(), services, { float: 'center' }, null, { config });

      await expect(image.buildMarkup(requireTitle('Example.png'))).resolves.toBe(
        '[[File:Example.png|thumb|center|&#32;]]',
      );
    });
  });
});
