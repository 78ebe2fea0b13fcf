import { describe, it, expect, vi } from 'vitest'
import {
  Dispatcher,
  DispatchError,
  DoesNotExistError,
  EventExistsError,
  ListProperty,
  Property,
  PropertyExistsError,
  ValidationError,
  composeManifest
} from '../src'

class Counter extends Dispatcher<{ value: number }, {}> {
  static properties = { value: new Property(0) }
}

describe('Property', () => {
  describe('Change Detection', () => {
    it('should start from the default value', () => {
      const counter = new Counter()

      expect(counter.get('value')).toBe(0)
    })

    it('should not emit when set to the current value', () => {
      const counter = new Counter()
      const listener = vi.fn()
      counter.bind({ value: listener })

      counter.set('value', 0)

      expect(listener).not.toHaveBeenCalled()
    })

    it('should treat -0 as equal to 0', () => {
      const counter = new Counter()
      const listener = vi.fn()
      counter.bind({ value: listener })

      counter.set('value', -0)

      expect(listener).not.toHaveBeenCalled()
      expect(Object.is(counter.get('value'), 0)).toBe(true)
    })

    it('should emit once per change with the instance, value and change record', () => {
      const counter = new Counter()
      const listener = vi.fn()
      counter.bind({ value: listener })

      counter.set('value', 5)
      counter.set('value', 5)

      expect(listener).toHaveBeenCalledTimes(1)
      expect(listener).toHaveBeenCalledWith(counter, 5, {
        property: Counter.properties.value,
        old: 0,
        mutation: false
      })
    })

    it('should store values per instance', () => {
      const first = new Counter()
      const second = new Counter()

      first.set('value', 1)

      expect(first.get('value')).toBe(1)
      expect(second.get('value')).toBe(0)
    })

    it('should compare structured values deeply', () => {
      class Point extends Dispatcher<{ position: { x: number; y: number } }, {}> {
        static properties = { position: new Property({ x: 0, y: 0 }) }
      }
      const point = new Point()
      const listener = vi.fn()
      point.bind({ position: listener })

      point.set('position', { x: 0, y: 0 })
      expect(listener).not.toHaveBeenCalled()

      point.set('position', { x: 1, y: 0 })
      expect(listener).toHaveBeenCalledTimes(1)
    })

    it('should use a custom equality comparator', () => {
      class Labelled extends Dispatcher<{ label: string }, {}> {
        static properties = {
          label: new Property('a', { isEqual: (a: string, b: string) => a.toLowerCase() === b.toLowerCase() })
        }
      }
      const labelled = new Labelled()
      const listener = vi.fn()
      labelled.bind({ label: listener })

      labelled.set('label', 'A')

      expect(listener).not.toHaveBeenCalled()
      expect(labelled.get('label')).toBe('a')
    })

    it('should not share container defaults between instances', () => {
      class Tagged extends Dispatcher<{ tags: string[] }, {}> {
        static properties = { tags: new Property(['a']) }
      }
      const first = new Tagged()
      const second = new Tagged()

      first.get('tags').push('b')

      expect(second.get('tags')).toEqual(['a'])
      expect(Tagged.properties.tags.defaultValue).toEqual(['a'])
    })
  })

  describe('Validation', () => {
    class Positive extends Dispatcher<{ amount: number }, {}> {
      static properties = {
        amount: new Property(0, { validate: (value: number) => (value < 0 ? ['must not be negative'] : null) })
      }
    }

    it('should reject invalid values without storing or emitting', () => {
      const positive = new Positive()
      const listener = vi.fn()
      positive.bind({ amount: listener })

      expect(() => positive.set('amount', -1)).toThrow(ValidationError)
      expect(() => positive.set('amount', -1)).toThrow('must not be negative')
      expect(positive.get('amount')).toBe(0)
      expect(listener).not.toHaveBeenCalled()
    })

    it('should accept values the validator passes', () => {
      const positive = new Positive()

      positive.set('amount', 3)

      expect(positive.get('amount')).toBe(3)
    })
  })

  describe('Accessors', () => {
    it('should expose a property through a handle', () => {
      const counter = new Counter()
      const handle = counter.property('value')

      handle.set(handle.get() + 3)

      expect(handle.name).toBe('value')
      expect(counter.get('value')).toBe(3)
    })

    it('should reject unknown property names', () => {
      const loose = new (class extends Dispatcher {})()

      expect(() => loose.get('missing')).toThrow(DoesNotExistError)
      expect(() => loose.set('missing', 1)).toThrow(DoesNotExistError)
    })

    it('should emit property events through emit', () => {
      const counter = new Counter()
      const listener = vi.fn()
      counter.bind({ value: listener })

      counter.emit('value', counter, 9)

      expect(listener).toHaveBeenCalledWith(counter, 9)
      expect(counter.get('value')).toBe(0)
    })
  })
})

describe('Manifest Composition', () => {
  class Base extends Dispatcher {
    static events = ['opened']
    static properties: Record<string, Property> = { title: new Property('untitled') }
  }

  class Child extends Base {
    static events = ['opened', 'closed']
    static properties = { size: new Property(1) }
  }

  it('should merge declarations along the class chain', () => {
    const manifest = composeManifest(Child)

    expect([...manifest.events]).toEqual(['opened', 'closed'])
    expect([...manifest.properties.keys()]).toEqual(['title', 'size'])
  })

  it('should return the same frozen manifest every time', () => {
    const manifest = composeManifest(Child)

    expect(composeManifest(Child)).toBe(manifest)
    expect(Object.isFrozen(manifest)).toBe(true)
  })

  it('should give inherited properties and events to instances', () => {
    const child = new Child()
    const listener = vi.fn()

    child.bind({ title: listener, closed: listener })
    child.set('title', 'report')
    child.emit('closed')

    expect(listener).toHaveBeenCalledTimes(2)
    expect(child.get('size')).toBe(1)
  })

  it('should let a subclass override a property', () => {
    class Renamed extends Base {
      static properties = { title: new Property('custom') }
    }

    expect(new Renamed().get('title')).toBe('custom')
    expect(new Base().get('title')).toBe('untitled')
  })

  it('should reject an event that shadows a property', () => {
    class Broken extends Base {
      static events = ['title']
    }

    expect(() => composeManifest(Broken)).toThrow(PropertyExistsError)
    expect(() => new Broken()).toThrow('A property named "title" already exists')
  })

  it('should reject a property that shadows an event', () => {
    class Broken extends Base {
      static properties = { opened: new Property(false) }
    }

    expect(() => composeManifest(Broken)).toThrow(EventExistsError)
    expect(() => composeManifest(Broken)).toThrow('An event named "opened" already exists')
  })

  it('should reject one property object declared under two names', () => {
    const shared = new Property(0)
    class Twice extends Dispatcher {
      static properties = { first: shared, second: shared }
    }

    expect(() => composeManifest(Twice)).toThrow(DispatchError)
    expect(() => composeManifest(Twice)).toThrow('Property "first" cannot also be declared as "second"')
  })

  it('should reject malformed declarations', () => {
    class BadEvents extends Dispatcher {}
    class BadProperties extends Dispatcher {}
    Object.defineProperty(BadEvents, 'events', { value: [1, 2] })
    Object.defineProperty(BadProperties, 'properties', { value: { value: 0 } })

    expect(() => composeManifest(BadEvents)).toThrow('BadEvents.events must be an array of event names')
    expect(() => composeManifest(BadProperties)).toThrow('BadProperties.properties.value is not a Property')
  })

  it('should keep list properties declared on a base class working in subclasses', () => {
    class Listed extends Dispatcher {
      static properties: Record<string, Property> = { items: new ListProperty() }
    }
    class MoreListed extends Listed {}
    const listed = new MoreListed()
    const listener = vi.fn()
    listed.bind({ items: listener })

    listed.set('items', ['a'])

    expect(listener).toHaveBeenCalledTimes(1)
  })
})
