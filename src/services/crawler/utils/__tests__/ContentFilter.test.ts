import { ContentFilter } from '../ContentFilter';
import { ContentBlock, HeadingLevel } from '../../interfaces/types';

const h = (level: HeadingLevel, text: string): ContentBlock => ({ type: 'heading', level, text });
const p = (text: string): ContentBlock => ({ type: 'paragraph', text });

describe('ContentFilter', () => {
  it('should drop a heading directly followed by another heading', () => {
    expect(ContentFilter.filter([h(1, 'A'), h(2, 'B'), p('x')])).toEqual([h(2, 'B'), p('x')]);
  });

  it('should drop trailing headings', () => {
    expect(ContentFilter.filter([p('intro'), h(2, 'Tarihi'), p('body'), h(2, 'Ayrıca bakınız')])).toEqual([
      p('intro'),
      h(2, 'Tarihi'),
      p('body'),
    ]);
  });

  it('should keep every paragraph', () => {
    expect(ContentFilter.filter([p('a'), p('b')])).toEqual([p('a'), p('b')]);
  });

  it('should keep a heading whose paragraph comes after several others', () => {
    const blocks = [h(2, 'S'), p('one'), p('two'), h(3, 'Empty'), h(3, 'Full'), p('three')];
    expect(ContentFilter.filter(blocks)).toEqual([h(2, 'S'), p('one'), p('two'), h(3, 'Full'), p('three')]);
  });

  it('should return an empty list for headings only', () => {
    expect(ContentFilter.filter([h(2, 'A'), h(2, 'B')])).toEqual([]);
    expect(ContentFilter.filter([])).toEqual([]);
  });

  it('should not modify its input', () => {
    const blocks = [h(2, 'A'), h(2, 'B')];
    ContentFilter.filter(blocks);
    expect(blocks).toHaveLength(2);
  });
});
