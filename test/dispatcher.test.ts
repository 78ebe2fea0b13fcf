import { describe, it, expect, vi } from 'vitest'
import {
  Dispatcher,
  DoesNotExistError,
  PropertyExistsError,
  Property,
  STOP,
  halt,
  method
} from '../src'

class Sender extends Dispatcher<{}, { message: [text: string]; ping: [] }> {
  static events = ['message', 'ping']
}

class Loose extends Dispatcher {}

class View {
  received: string[] = []

  onMessage(text: string) {
    this.received.push(text)
  }
}

describe('Dispatcher', () => {
  describe('Binding and Emission', () => {
    it('should call a bound listener once with the emitted arguments', () => {
      const sender = new Sender()
      const listener = vi.fn()

      sender.bind({ message: listener })
      sender.emit('message', 'hello')

      expect(listener).toHaveBeenCalledTimes(1)
      expect(listener).toHaveBeenCalledWith('hello')
    })

    it('should ignore binding the same listener twice', () => {
      const sender = new Sender()
      const listener = vi.fn()

      sender.bind({ message: listener })
      sender.bind({ message: listener })
      sender.emit('message', 'hello')

      expect(listener).toHaveBeenCalledTimes(1)
    })

    it('should call listeners in bind order', () => {
      const sender = new Sender()
      const calls: number[] = []
      const first = () => { calls.push(1) }
      const second = () => { calls.push(2) }
      const third = () => { calls.push(3) }

      sender.bind({ ping: first })
      sender.bind({ ping: second })
      sender.bind({ ping: third })

      expect(sender.emit('ping')).toBe(true)
      expect(calls).toEqual([1, 2, 3])
    })

    it('should stop propagation when a listener returns STOP', () => {
      const sender = new Sender()
      const calls: number[] = []
      const first = () => { calls.push(1) }
      const second = () => {
        calls.push(2)
        return STOP
      }
      const third = () => { calls.push(3) }

      sender.bind({ ping: first })
      sender.bind({ ping: second })
      sender.bind({ ping: third })

      expect(sender.emit('ping')).toBe(false)
      expect(calls).toEqual([1, 2])
    })

    it('should stop propagation when a listener calls halt()', () => {
      const sender = new Sender()
      const calls: string[] = []
      const stopper = (text: string) => {
        calls.push(`stopper: ${text}`)
        halt()
      }
      const later = (text: string) => { calls.push(`later: ${text}`) }

      sender.bind({ message: stopper })
      sender.bind({ message: later })

      expect(sender.emit('message', 'a')).toBe(false)
      expect(calls).toEqual(['stopper: a'])
    })

    it('should treat emitting without listeners as a no-op', () => {
      const sender = new Sender()

      expect(sender.emit('ping')).toBe(true)
    })

    it('should propagate listener errors out of emit', () => {
      const sender = new Sender()
      const failing = () => {
        throw new Error('boom')
      }

      sender.bind({ ping: failing })

      expect(() => sender.emit('ping')).toThrow('boom')
    })

    it('should append keywords after the positional arguments', () => {
      const sender = new Sender()
      const listener = vi.fn()

      sender.bind({ message: listener })
      sender.emitWithKeywords('message', { urgent: true }, 'hello')

      expect(listener).toHaveBeenCalledWith('hello', { urgent: true })
    })

    it('should pass keywords given straight to the event', () => {
      const sender = new Sender()
      const listener = vi.fn()

      sender.bind({ message: listener })
      sender.getDispatcherEvent('message').emit(['hello'], { urgent: false })

      expect(listener).toHaveBeenCalledWith('hello', { urgent: false })
    })

    it('should report a stop from a keyword emission', () => {
      const sender = new Sender()
      const last = vi.fn()

      sender.bind({ ping: () => STOP })
      sender.bind({ ping: last })

      expect(sender.emitWithKeywords('ping', { reason: 'test' })).toBe(false)
      expect(last).not.toHaveBeenCalled()
    })

    it('should not deliver an emission to listeners bound during it', () => {
      const sender = new Sender()
      const late = vi.fn()
      const binder = () => {
        sender.bind({ ping: late })
      }

      sender.bind({ ping: binder })
      sender.emit('ping')
      expect(late).not.toHaveBeenCalled()

      sender.emit('ping')
      expect(late).toHaveBeenCalledTimes(1)
    })

    it('should skip listeners unbound during an emission', () => {
      const sender = new Sender()
      const victim = vi.fn()
      const remover = () => {
        sender.unbind(victim)
      }

      sender.bind({ ping: remover })
      sender.bind({ ping: victim })
      sender.emit('ping')

      expect(victim).not.toHaveBeenCalled()
    })
  })

  describe('Unknown Names', () => {
    it('should reject emitting an unregistered event', () => {
      const loose = new Loose()

      expect(() => loose.emit('missing')).toThrow(DoesNotExistError)
      expect(() => loose.emit('missing')).toThrow('Event "missing" does not exist')
    })

    it('should bind nothing when one name is unknown', () => {
      const loose = new Loose()
      const known = vi.fn()
      const unknown = vi.fn()
      loose.registerEvent('known')

      expect(() => loose.bind({ known, unknown })).toThrow(DoesNotExistError)

      loose.emit('known')
      expect(known).not.toHaveBeenCalled()
    })

    it('should reject a listener that is not a function', () => {
      const loose = new Loose()
      loose.registerEvent('known')
      // Untyped callers can still pass anything
      const bindUntyped = () => Reflect.apply(loose.bind, loose, [{ known: 'not a function' }])

      expect(bindUntyped).toThrow(TypeError)
      expect(bindUntyped).toThrow('Listener for "known" must be a function or a method() subscriber')
    })
  })

  describe('Unbinding', () => {
    it('should remove a function from every event', () => {
      const sender = new Sender()
      const listener = vi.fn()

      sender.bind({ message: listener, ping: listener })
      sender.unbind(listener)
      sender.emit('message', 'a')
      sender.emit('ping')

      expect(listener).not.toHaveBeenCalled()
    })

    it('should call method subscribers on their owner', () => {
      const sender = new Sender()
      const view = new View()

      sender.bind({ message: method(view, 'onMessage') })
      sender.emit('message', 'a')

      expect(view.received).toEqual(['a'])
    })

    it('should remove every method subscription of an owner', () => {
      const sender = new Sender()
      const view = new View()
      const other = new View()

      sender.bind({ message: method(view, 'onMessage') })
      sender.bind({ message: method(other, 'onMessage') })
      sender.emit('message', 'a')

      sender.unbind(view)
      sender.emit('message', 'b')

      expect(view.received).toEqual(['a'])
      expect(other.received).toEqual(['a', 'b'])
    })

    it('should remove a single method subscriber', () => {
      const sender = new Sender()
      const view = new View()

      sender.bind({ message: method(view, 'onMessage') })
      sender.unbind(method(view, 'onMessage'))
      sender.emit('message', 'a')

      expect(view.received).toEqual([])
    })

    it('should ignore unbinding something that was never bound', () => {
      const sender = new Sender()
      const listener = vi.fn()

      sender.bind({ ping: listener })

      expect(() => sender.unbind(() => {}, {})).not.toThrow()
      sender.emit('ping')
      expect(listener).toHaveBeenCalledTimes(1)
    })
  })

  describe('Runtime Registration', () => {
    class Named extends Dispatcher {
      static properties = { value: new Property(0) }
    }

    it('should register events at runtime', () => {
      const loose = new Loose()
      const listener = vi.fn()

      loose.registerEvent('opened', 'closed')
      loose.bind({ opened: listener })
      loose.emit('opened', 1)

      expect(listener).toHaveBeenCalledWith(1)
      expect(loose.eventNames).toEqual(['opened', 'closed'])
    })

    it('should keep listeners when an event is registered again', () => {
      const loose = new Loose()
      const listener = vi.fn()

      loose.registerEvent('opened')
      loose.bind({ opened: listener })
      loose.registerEvent('opened')
      loose.emit('opened')

      expect(listener).toHaveBeenCalledTimes(1)
    })

    it('should register nothing when a name is a property', () => {
      const named = new Named()

      expect(() => named.registerEvent('fresh', 'value')).toThrow(PropertyExistsError)
      expect(() => named.registerEvent('fresh', 'value')).toThrow('A property named "value" already exists')
      expect(named.eventNames).toEqual(['value'])
    })
  })

  describe('End-to-end', () => {
    class Counter extends Dispatcher<{ value: number }, {}> {
      static properties = { value: new Property(0) }
    }

    it('should log only actual changes of a property', () => {
      const counter = new Counter()
      const log: number[] = []
      const onValue = (_: Counter, value: number) => {
        log.push(value)
      }

      counter.bind({ value: onValue })
      counter.set('value', 1)
      counter.set('value', 1)
      counter.set('value', 2)

      expect(log).toEqual([1, 2])
    })
  })
})
