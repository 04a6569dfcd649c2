import { IActivityRepository } from '../../ports/IActivityRepository.js';
import { IEventDispatcher } from '../../ports/IEventDispatcher.js';
import { IRegistrationResult } from '../../../domain/entities/Activity.js';
import { ParticipantSignedUp } from '../../../domain/events/ParticipantSignedUp.js';

export interface RegistrationRequest {
    activityName: string;
    email: string;
}

export class SignUpForActivity {
    constructor(
        private activityRepository: IActivityRepository,
        private eventDispatcher: IEventDispatcher
    ) { }

    /**
     * Add a student to an activity's roster. Capacity is advisory, so a
     * full activity still accepts the signup.
     */
    async execute(request: RegistrationRequest): Promise<IRegistrationResult> {
        const result = await this.activityRepository.addParticipant(request.activityName, request.email);

        await this.eventDispatcher.dispatch(new ParticipantSignedUp(result.activityName, result.email));

        return result;
    }
}
