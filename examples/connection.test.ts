import { describe, it, expect } from 'vitest';
import { Connection } from './connection.js';

describe('Connection host', () => {
  it('starts in the initial state', () => {
    const c = new Connection();
    expect(c.state).toBe('Idle');
    expect(c.battery).toBe(100);
  });

  it('drives the table and applies its own guards', () => {
    const c = new Connection();

    c.start();
    expect(c.state).toBe('Running');
    expect(c.battery).toBe(90);

    c.pause();
    expect(c.state).toBe('Idle');

    c.start();
    expect(c.state).toBe('Running');
    expect(c.battery).toBe(80);

    c.stop();
    expect(c.state).toBe('Idle');

    c.connect(3);
    expect(c.state).toBe('Connected');
    expect(c.connectionId).toBe(3);
    expect(c.battery).toBe(75);

    c.tick();
    c.tick();
    expect(c.state).toBe('Connected');
    expect(c.tickCount).toBe(2);

    c.disconnect();
    expect(c.state).toBe('Idle');
    expect(c.connectionId).toBe(0);

    c.start();
    c.connect(4);
    expect(c.state).toBe('Connected');

    c.reset();
    expect(c.state).toBe('Idle');
    expect(c.battery).toBe(100);
    expect(c.connectionId).toBe(0);
    expect(c.tickCount).toBe(0);
  });

  it('keeps the state when a guard rejects the transition', () => {
    const c = new Connection();
    c.battery = 10;
    c.start();
    expect(c.state).toBe('Idle');

    c.battery = 100;
    c.start();
    c.connect(10);
    expect(c.state).toBe('Running');
    expect(c.connectionId).toBe(0);
  });

  it('ignores events with no transition from the current state', () => {
    const c = new Connection();
    c.tick();
    c.disconnect();
    expect(c.state).toBe('Idle');
    expect(c.tickCount).toBe(0);
  });
});
