import { createMachine, type TableMachine } from '../src/index.js';

/**
 * A host application driving a compiled transition table. The table only says
 * which state an event leads to; guards, side effects and committing the new
 * state stay with the host.
 */
export const CONNECTION_MACHINE = `
derive_states: [Debug, Clone, PartialEq, Eq, Hash],
derive_events: [Debug, Clone, PartialEq],
transitions: {
  *Idle + Start = Running,
  Running + Pause | Stop = Idle,
  Idle | Running + Connect = Connected,
  Connected + Disconnect = Idle,
  Connected + Tick = _,
  _ + Reset = Idle,
}
`;

const table: TableMachine = createMachine(CONNECTION_MACHINE);

export class Connection {
  state: string = table.initial;
  battery = 100;
  connectionId = 0;
  tickCount = 0;
  readonly maxConnections = 5;

  start(): void {
    const next = table.processEvent(this.state, 'Start');
    if (next === undefined || this.battery < 20) return;
    this.battery -= 10;
    this.state = next;
  }

  pause(): void {
    this.state = table.processEvent(this.state, 'Pause') ?? this.state;
  }

  stop(): void {
    this.state = table.processEvent(this.state, 'Stop') ?? this.state;
  }

  connect(id: number): void {
    const next = table.processEvent(this.state, 'Connect');
    if (next === undefined) return;
    if (id > this.maxConnections || this.battery < 5) return;
    this.connectionId = id;
    this.battery -= 5;
    this.state = next;
  }

  disconnect(): void {
    const next = table.processEvent(this.state, 'Disconnect');
    if (next === undefined) return;
    this.connectionId = 0;
    this.state = next;
  }

  tick(): void {
    const next = table.processEvent(this.state, 'Tick');
    if (next === undefined) return;
    this.tickCount += 1;
    this.state = next;
  }

  reset(): void {
    const next = table.processEvent(this.state, 'Reset');
    if (next === undefined) return;
    this.battery = 100;
    this.connectionId = 0;
    this.tickCount = 0;
    this.state = next;
  }
}
