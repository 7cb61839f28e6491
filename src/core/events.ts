import { EventBus } from '../events/bus';
import { HeadlessRenderer } from '../events/renderers/headless';
import { JsonRenderer } from '../events/renderers/json';
import type { EventMode } from '../events/schema';

export type EventSystem = {
  bus: EventBus;
  mode: EventMode;
};

export type EventOutput = 'stdout' | 'stderr';

/**
 * Wires the renderer for `mode` to a fresh bus. `output: 'stderr'` keeps
 * stdout free for command output such as a rendered document.
 */
export function initEvents(mode: EventMode, options?: { output?: EventOutput }): EventSystem {
  const bus = new EventBus();
  const toStderr = options?.output === 'stderr';
  const renderer =
    mode === 'json'
      ? new JsonRenderer(
          toStderr ? (line) => process.stderr.write(`${line}\n`) : (line) => console.log(line),
        )
      : new HeadlessRenderer(toStderr ? { stdout: process.stderr } : undefined);

  bus.subscribe((event) => {
    renderer.render(event);
  });

  return { bus, mode };
}
