import { isEnvFlagSet } from '../../utils/env';
import type { Event } from '../schema';

export class JsonRenderer {
  constructor(private readonly write: (line: string) => void = (line) => console.log(line)) {}

  render(event: Event): void {
    if (this.shouldSuppress(event)) {
      return;
    }
    this.write(JSON.stringify(event));
  }

  private shouldSuppress(event: Event): boolean {
    if (isEnvFlagSet('ROADMAP_QUIET')) {
      return event.level !== 'warn' && event.level !== 'error';
    }
    if (event.level === 'debug' && !isEnvFlagSet('ROADMAP_DEBUG')) {
      return true;
    }
    return false;
  }
}
