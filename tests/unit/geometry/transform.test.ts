import { Matrix4, Vector3 } from 'three';
import { identity, inverse, multiply, perspectiveFovRH, scale, translate } from '@quadgrid/geometry';

describe('transform builders', () => {
  it('should add to the translation column', () => {
    const m = translate(identity(), new Vector3(1, 2, 3));

    expect(m.elements.slice(12, 15)).toEqual([1, 2, 3]);
    expect(new Vector3(0, 0, 0).applyMatrix4(m).toArray()).toEqual([1, 2, 3]);
  });

  it('should scale rows, translation included', () => {
    const m = scale(translate(identity(), new Vector3(1, 2, 3)), new Vector3(2, 2, 2));

    expect(new Vector3(0, 0, 0).applyMatrix4(m).toArray()).toEqual([2, 4, 6]);
    expect(new Vector3(1, 1, 1).applyMatrix4(m).toArray()).toEqual([4, 6, 8]);
  });

  it('should write a right-handed perspective projection', () => {
    const m = perspectiveFovRH(new Matrix4(), Math.PI / 2, 2, 1, 10);
    const e = m.elements;

    expect(e[0]).toBeCloseTo(0.5);
    expect(e[5]).toBeCloseTo(1);
    expect(e[10]).toBeCloseTo(-10 / 9);
    expect(e[14]).toBeCloseTo(-10 / 9);
    expect(e[11]).toBe(-1);
    expect(e[15]).toBe(0);
  });

  it('should invert in place', () => {
    const m = inverse(translate(identity(), new Vector3(50, 0, 0)));

    expect(m.elements[12]).toBeCloseTo(-50);
  });

  it('should multiply without touching the operands', () => {
    const a = translate(identity(), new Vector3(1, 0, 0));
    const b = scale(identity(), new Vector3(3, 3, 3));

    const ab = multiply(a, b);

    expect(new Vector3(1, 0, 0).applyMatrix4(ab).toArray()).toEqual([4, 0, 0]);
    expect(a.elements[0]).toBe(1);
    expect(b.elements[12]).toBe(0);
  });
});
