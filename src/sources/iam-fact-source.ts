import {
    GetAccessKeyLastUsedCommand,
    IAMClient,
    ListAccessKeysCommand,
    ListUsersCommand,
} from '@aws-sdk/client-iam';
import { GetCallerIdentityCommand, STSClient } from '@aws-sdk/client-sts';
import { classifyAwsError, InvalidFactError, toSetupError } from '../errors.js';
import type { AccessKeyFact, AccountIdentity } from '../types/index.js';
import { createModuleLogger } from '../utils/logger.js';

const log = createModuleLogger('iam-source');

/**
 * Where access key facts come from. Implementations resolve last-used data
 * before returning and own any retry policy.
 */
export interface AccessKeyFactSource {
    describeAccount(): Promise<AccountIdentity>;
    listUsers(): Promise<string[]>;
    listAccessKeysForUser(userName: string): Promise<AccessKeyFact[]>;
}

export interface AwsContext {
    profile?: string;
    region: string;
    maxAttempts: number;
}

// IAM reports "N/A" for keys that were never used
function lastUsedField(value: string | undefined): string | undefined {
    return value && value !== 'N/A' ? value : undefined;
}

export class IamFactSource implements AccessKeyFactSource {
    private readonly iam: IAMClient;
    private readonly sts: STSClient;
    private readonly context: AwsContext;

    constructor(context: AwsContext) {
        this.context = context;
        const clientConfig = {
            region: context.region,
            profile: context.profile,
            maxAttempts: context.maxAttempts,
        };
        this.iam = new IAMClient(clientConfig);
        this.sts = new STSClient(clientConfig);
    }

    async describeAccount(): Promise<AccountIdentity> {
        try {
            const identity = await this.sts.send(new GetCallerIdentityCommand({}));
            if (!identity.Account) {
                throw new Error('STS returned no account id');
            }
            log.info('Connected to AWS account', {
                account: identity.Account,
                profile: this.context.profile ?? 'default',
            });
            return { accountId: identity.Account, arn: identity.Arn };
        } catch (error) {
            throw toSetupError(error, this.context.profile);
        }
    }

    async listUsers(): Promise<string[]> {
        const users: string[] = [];
        let marker: string | undefined;

        do {
            const page = await this.send('ListUsers', () =>
                this.iam.send(new ListUsersCommand({ Marker: marker }))
            );
            for (const user of page.Users ?? []) {
                if (user.UserName) users.push(user.UserName);
            }
            marker = page.IsTruncated ? page.Marker : undefined;
        } while (marker);

        log.debug('Listed IAM users', { count: users.length });
        return users;
    }

    async listAccessKeysForUser(userName: string): Promise<AccessKeyFact[]> {
        const facts: AccessKeyFact[] = [];
        let marker: string | undefined;

        do {
            const page = await this.send('ListAccessKeys', () =>
                this.iam.send(new ListAccessKeysCommand({ UserName: userName, Marker: marker }))
            );

            for (const key of page.AccessKeyMetadata ?? []) {
                if (!key.AccessKeyId) {
                    throw new InvalidFactError(userName, '(unknown)', 'access key id is missing');
                }
                const accessKeyId = key.AccessKeyId;
                const lastUsed = await this.send('GetAccessKeyLastUsed', () =>
                    this.iam.send(new GetAccessKeyLastUsedCommand({ AccessKeyId: accessKeyId }))
                );

                facts.push({
                    userName,
                    accessKeyId,
                    createdAt: key.CreateDate,
                    lastUsedAt: lastUsed.AccessKeyLastUsed?.LastUsedDate,
                    isActive: key.Status === 'Active',
                    lastUsedService: lastUsedField(lastUsed.AccessKeyLastUsed?.ServiceName),
                    lastUsedRegion: lastUsedField(lastUsed.AccessKeyLastUsed?.Region),
                });
            }
            marker = page.IsTruncated ? page.Marker : undefined;
        } while (marker);

        log.debug('Listed access keys', { user: userName, count: facts.length });
        return facts;
    }

    private async send<T>(operation: string, call: () => Promise<T>): Promise<T> {
        try {
            return await call();
        } catch (error) {
            throw classifyAwsError(error, operation);
        }
    }
}
