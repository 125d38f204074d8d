/**
 * StateTracker -- last-known state of cluster guests (VMs and containers).
 *
 * Reports guests that went running -> stopped and guests that came back.
 * The first sighting of a guest populates state without reporting anything
 * (prevents false alerts on startup).
 */

export interface GuestState {
  vmid: number;
  name: string;
  node: string;
  type: 'qemu' | 'lxc';
  status: string;
}

export interface GuestTransitions {
  stopped: GuestState[];
  recovered: GuestState[];
}

export class StateTracker {
  private guests = new Map<number, GuestState>();

  update(current: GuestState[]): GuestTransitions {
    const transitions: GuestTransitions = { stopped: [], recovered: [] };

    for (const guest of current) {
      const tracked = this.guests.get(guest.vmid);
      this.guests.set(guest.vmid, { ...guest });

      if (!tracked || tracked.status === guest.status) continue;

      if (tracked.status === 'running' && guest.status === 'stopped') {
        transitions.stopped.push(guest);
      } else if (guest.status === 'running') {
        transitions.recovered.push(guest);
      }
    }

    return transitions;
  }

  /** Get the last tracked status for a guest */
  getTrackedStatus(vmid: number): string | undefined {
    return this.guests.get(vmid)?.status;
  }
}
