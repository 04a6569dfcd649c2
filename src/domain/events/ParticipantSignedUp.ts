import { RosterChanged } from './RosterChanged.js';

export class ParticipantSignedUp extends RosterChanged {
    readonly eventName = 'ParticipantSignedUp';
}
