import { describe, expect, it } from 'vitest';
import { isVlaRelated, matchVla } from './vla-filter.js';

describe('isVlaRelated', () => {
  const accepted: Array<[string, string]> = [
    ['MAP-VLA: Memory-Augmented Prompting for Vision-Language-Action Model', ''],
    ['Audio-VLA: Adding Contact Audio to VLA model', ''],
    ['Training VLA policy for robotic manipulation', ''],
    ['A new VLA framework for embodied AI', ''],
    ['', 'We propose a Vision-Language-Action model for robots'],
    ['', 'Our vision language action approach improves performance'],
  ];

  const rejected: Array<[string, string]> = [
    ['Large Vision-Language Models for Visual Understanding', ''],
    ['LVLM: A new approach to vision-language tasks', ''],
    ['Embodied AI with foundation models', ''],
    ['Multimodal Learning for Robotics', ''],
    ['VLA in finance: value-at-risk analysis', ''],
  ];

  it.each(accepted)('accepts %j / %j', (title, abstract) => {
    expect(isVlaRelated(title, abstract)).toBe(true);
  });

  it.each(rejected)('rejects %j / %j', (title, abstract) => {
    expect(isVlaRelated(title, abstract)).toBe(false);
  });
});

describe('matchVla', () => {
  it('reports the full phrase that matched', () => {
    const m = matchVla('MAP-VLA: Memory-Augmented Prompting for Vision-Language-Action Model', '');
    expect(m).toEqual({ related: true, matchedTerms: ['vision-language-action'] });
  });

  it('reports context phrases for a standalone VLA token', () => {
    const m = matchVla('Training VLA policy for robotic manipulation', '');
    expect(m).toEqual({ related: true, matchedTerms: ['vla policy'] });
  });

  it('needs VLA as its own word for the context rule', () => {
    // "openvla model" contains "vla model" but not " vla "
    expect(matchVla('OpenVLA model scaling', '').related).toBe(false);
  });

  it('uses configured rules', () => {
    const rules = { fullPhrases: ['embodied foundation model'], contexts: ['vla planner'] };
    expect(matchVla('An Embodied Foundation Model for Homes', '', rules).related).toBe(true);
    expect(matchVla('A VLA planner for kitchens', '', rules).related).toBe(true);
    expect(matchVla('Training VLA policy for robotic manipulation', '', rules).related).toBe(false);
  });
});
