import {
  AudioRouting,
  LocalMediaOptions,
  MediaCapture,
  MediaStreamHandle,
  MediaTrack,
  MediaTrackKind,
} from '../interfaces/media-capture';

let nextId = 1;

export class FakeTrack implements MediaTrack {
  readonly id = `track-${nextId++}`;
  enabled = true;
  stopped = false;
  onended: (() => void) | null = null;

  constructor(readonly kind: MediaTrackKind) {}

  stop(): void {
    this.stopped = true;
  }

  // Simulates the platform ending the track (e.g. "Stop sharing")
  end(): void {
    this.stop();
    this.onended?.();
  }
}

export class FakeStream implements MediaStreamHandle {
  readonly id = `stream-${nextId++}`;
  readonly tracks: FakeTrack[];

  constructor(kinds: MediaTrackKind[]) {
    this.tracks = kinds.map((kind) => new FakeTrack(kind));
  }

  getTracks(): FakeTrack[] {
    return [...this.tracks];
  }

  track(kind: MediaTrackKind): FakeTrack {
    const track = this.tracks.find((candidate) => candidate.kind === kind);
    if (!track) {
      throw new Error(`Stream ${this.id} has no ${kind} track`);
    }
    return track;
  }
}

export function mediaError(name: string): Error {
  const error = new Error(`${name}: media request failed`);
  error.name = name;
  return error;
}

export class FakeMediaCapture implements MediaCapture {
  readonly acquired: FakeStream[] = [];
  readonly released: MediaStreamHandle[] = [];
  readonly screens: FakeStream[] = [];
  readonly switched: MediaTrack[] = [];
  readonly requests: LocalMediaOptions[] = [];
  failNext: Error | null = null;
  failNextScreen: Error | null = null;
  private gate: Promise<void> | null = null;

  // Holds the next acquireLocalMedia until release() is called
  hold(): { release: () => void } {
    let release: () => void = () => undefined;
    const promise = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    this.gate = promise;
    return { release };
  }

  async acquireLocalMedia(options: LocalMediaOptions): Promise<FakeStream> {
    this.requests.push(options);
    const gate = this.gate;
    this.gate = null;
    if (gate) {
      await gate;
    }
    const failure = this.failNext;
    if (failure) {
      this.failNext = null;
      throw failure;
    }
    const stream = new FakeStream(options.video ? ['audio', 'video'] : ['audio']);
    this.acquired.push(stream);
    return stream;
  }

  async acquireScreenMedia(): Promise<FakeStream> {
    const failure = this.failNextScreen;
    if (failure) {
      this.failNextScreen = null;
      throw failure;
    }
    const stream = new FakeStream(['video']);
    this.screens.push(stream);
    return stream;
  }

  releaseLocalMedia(stream: MediaStreamHandle): void {
    stream.getTracks().forEach((track) => track.stop());
    this.released.push(stream);
  }

  async switchCamera(track: MediaTrack): Promise<void> {
    this.switched.push(track);
  }
}

export class FakeAudioRouting implements AudioRouting {
  readonly calls: boolean[] = [];

  async setSpeakerphoneOn(on: boolean): Promise<void> {
    this.calls.push(on);
  }
}
