import { describe, it, expect } from 'vitest';
import { EnergyState } from '../../src/engine/energy';

describe('EnergyState', () => {
  it('starts full by default', () => {
    const energy = new EnergyState();
    expect(energy.maxCharge).toBe(4.0);
    expect(energy.currentCharge).toBe(4.0);
  });

  it('deploys at most the stored charge', () => {
    const energy = new EnergyState(4.0, 1.0);
    expect(energy.deploy(0.5)).toBe(0.5);
    expect(energy.currentCharge).toBe(0.5);
    expect(energy.deploy(2.0)).toBe(0.5);
    expect(energy.currentCharge).toBe(0);
  });

  it('harvests at most the remaining headroom', () => {
    const energy = new EnergyState(4.0, 3.5);
    expect(energy.harvest(1.0)).toBe(0.5);
    expect(energy.currentCharge).toBe(4.0);
    expect(energy.harvest(1.0)).toBe(0);
  });

  it('rejects negative requests', () => {
    const energy = new EnergyState();
    expect(() => energy.deploy(-1)).toThrow('deploy amount must be >= 0.');
    expect(() => energy.harvest(-1)).toThrow('harvest amount must be >= 0.');
  });

  it('rejects an initial charge outside [0, max]', () => {
    expect(() => new EnergyState(4.0, 5.0)).toThrow('current_charge must be <= max_charge.');
    expect(() => new EnergyState(4.0, -1)).toThrow('current_charge must be >= 0.');
    expect(() => new EnergyState(0)).toThrow('max_charge must be > 0.');
  });

  it('stays within bounds over a long mixed sequence', () => {
    const energy = new EnergyState(4.0, 2.0);
    const requests = [0.7, 1.9, 3.3, 0.1, 2.2, 4.8, 0.0, 1.1];
    for (let i = 0; i < 200; i++) {
      const amount = requests[i % requests.length];
      if (i % 3 === 0) energy.harvest(amount);
      else energy.deploy(amount);
      expect(energy.currentCharge).toBeGreaterThanOrEqual(0);
      expect(energy.currentCharge).toBeLessThanOrEqual(4.0);
    }
  });
});
