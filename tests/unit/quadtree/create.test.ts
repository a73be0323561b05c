import { Box3 } from 'three';
import { createBox } from '@quadgrid/geometry';
import { DEFAULT_QUADTREE_CONFIG, tryCreateQuadTree } from '@quadgrid/quadtree';
import { ROOT_BOX } from './helpers';

describe('tryCreateQuadTree', () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should build an initialized tree for valid input', () => {
    const result = tryCreateQuadTree<number>(ROOT_BOX, 3);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.getNumberNodes()).toBe(21);
      expect(result.value.getConfig()).toEqual(DEFAULT_QUADTREE_CONFIG);
    }
    expect(warn).not.toHaveBeenCalled();
  });

  it('should return INVALID_DEPTH instead of throwing', () => {
    const result = tryCreateQuadTree<number>(ROOT_BOX, 0);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('INVALID_DEPTH');
    }
  });

  it('should honor a configured maxDepth', () => {
    const result = tryCreateQuadTree<number>(ROOT_BOX, 5, { maxDepth: 4 });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Tree depth 5 exceeds configured maxDepth 4');
    }
  });

  it('should reject an invalid configuration', () => {
    const result = tryCreateQuadTree<number>(ROOT_BOX, 2, { maxDepth: 0 });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('INVALID_DEPTH');
    }
  });

  it('should reject empty and inverted boxes', () => {
    const empty = tryCreateQuadTree<number>(new Box3(), 2);
    const inverted = tryCreateQuadTree<number>(createBox(10, 0, 0, -10, 1, 1), 2);

    expect(empty.ok).toBe(false);
    expect(inverted.ok).toBe(false);
    if (!inverted.ok) {
      expect(inverted.error.code).toBe('INVALID_BOUNDS');
    }
  });

  it('should log each rejection as a warning', () => {
    tryCreateQuadTree<number>(ROOT_BOX, -1);

    expect(warn).toHaveBeenCalledWith(
      '[QuadTree]',
      'rejected: Tree depth must be a positive integer, got -1'
    );
  });
});
