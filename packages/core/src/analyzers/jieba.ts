// morphseg/analyzers/jieba - Chinese POS segmentation via @node-rs/jieba

import jieba from '@node-rs/jieba';
import { AnalyzerError } from '../errors.js';
import type { ChineseSegmenter, TaggedWord } from './types.js';

let dictionaryLoaded = false;

function ensureDictionary(): void {
  if (dictionaryLoaded) return;
  try {
    jieba.load();
  } catch (error) {
    throw new AnalyzerError('jieba', 'failed to load dictionary', { cause: error });
  }
  dictionaryLoaded = true;
}

export class JiebaSegmenter implements ChineseSegmenter {
  cut(text: string): TaggedWord[] {
    ensureDictionary();
    try {
      return jieba.tag(text).map(({ word, tag }) => ({ word, flag: tag }));
    } catch (error) {
      throw new AnalyzerError('jieba', 'segmentation failed', { cause: error });
    }
  }
}
