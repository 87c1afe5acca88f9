import { describe, expect, it } from 'vitest';
import { describeFields, prototypeGetters } from '../src/index.js';

class Profile {
  name = 'Ada';
  tags: string[] = [];
  nickname: string | null = null;
  onSave = () => {};
  #visits = 1;

  greet(): string {
    return `hi ${this.#visits}`;
  }

  get initials(): string {
    return this.name.slice(0, 1);
  }

  set secret(_value: string) {}
}

class Base {
  get kind(): string {
    return 'base';
  }
}

class Derived extends Base {
  id = 1;

  get label(): string {
    return `d${this.id}`;
  }
}

describe('describeFields', () => {
  it('should list data fields then getters, skipping methods, function fields and setters', () => {
    expect(describeFields(Profile).map((field) => field.name)).toEqual(['name', 'tags', 'nickname', 'initials']);
  });

  it('should walk inherited getters, nearest class first', () => {
    expect(describeFields(Derived).map((field) => field.name)).toEqual(['id', 'label', 'kind']);
  });

  it('should read a field from any instance', () => {
    const initials = describeFields(Profile).find((field) => field.name === 'initials');
    const profile = new Profile();
    profile.name = 'Grace';
    expect(initials?.read(profile)).toBe('G');
  });

  it('should build the list once per type', () => {
    expect(describeFields(Profile)).toBe(describeFields(Profile));
    expect(Object.isFrozen(describeFields(Profile))).toBe(true);
  });
});

describe('prototypeGetters', () => {
  it('should list inherited getters once per prototype', () => {
    expect(prototypeGetters(new Derived())).toEqual(['label', 'kind']);
    expect(prototypeGetters(new Derived())).toBe(prototypeGetters(new Derived()));
  });

  it('should find nothing on plain and prototype-less objects', () => {
    expect(prototypeGetters({ a: 1 })).toEqual([]);
    expect(prototypeGetters(Object.create(null))).toEqual([]);
  });
});
