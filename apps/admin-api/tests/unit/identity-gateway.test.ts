import { UserRole } from '@task-admin/contracts';
import { IdentityGateway, toProviderPatch } from '../../src/identity/identity.gateway';
import { InvalidClaimsError, InvalidIdError, InvalidRoleError, NoAuthContextError } from '../../src/errors';
import { FakeIdentityProvider, testRoleMapper } from '../helpers/identity';

describe('IdentityGateway', () => {
    let provider: FakeIdentityProvider;
    let gateway: IdentityGateway;

    beforeEach(() => {
        provider = new FakeIdentityProvider();
        gateway = new IdentityGateway(provider, testRoleMapper());
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('getUserFromContext', () => {
        beforeEach(() => {
            provider.users.push({ user_id: 'auth0|me', email: 'me@example.test', given_name: 'Ada' });
            provider.roles.set('auth0|me', [{ id: 'rol_member_test', name: 'Member' }]);
        });

        it('resolves the subject claim to the full user with roles', async () => {
            const user = await gateway.getUserFromContext({ claims: { sub: 'auth0|me', scope: 'openid' } });

            expect(user).toMatchObject({ id: 'auth0|me', email: 'me@example.test', givenName: 'Ada', roles: [UserRole.MEMBER] });
        });

        it('fails with NoAuthContext when no claims were attached', async () => {
            await expect(gateway.getUserFromContext({})).rejects.toBeInstanceOf(NoAuthContextError);
        });

        it.each([
            ['a string', 'eyJhbGciOi'],
            ['no subject', { scope: 'openid' }],
            ['an empty subject', { sub: '' }],
            ['a numeric subject', { sub: 42 }],
        ])('fails with InvalidClaims for %s', async (_label, claims) => {
            const getUser = jest.spyOn(provider, 'getUser');

            await expect(gateway.getUserFromContext({ claims })).rejects.toBeInstanceOf(InvalidClaimsError);
            expect(getUser).not.toHaveBeenCalled();
        });
    });

    describe('listUsers', () => {
        it('makes a single provider call and reports the provider total', async () => {
            provider.addUsers(30);
            const listUsers = jest.spyOn(provider, 'listUsers');

            const res = await gateway.listUsers(1, 10);

            expect(listUsers).toHaveBeenCalledTimes(1);
            expect(listUsers).toHaveBeenCalledWith(1, 10);
            expect(res.total).toBe(30);
            expect(res.users.map((u) => u.id)).toEqual([
                'auth0|user-10', 'auth0|user-11', 'auth0|user-12', 'auth0|user-13', 'auth0|user-14',
                'auth0|user-15', 'auth0|user-16', 'auth0|user-17', 'auth0|user-18', 'auth0|user-19',
            ]);
        });
    });

    describe('listAllUsers', () => {
        it('concatenates every page of 100 in provider order', async () => {
            provider.addUsers(250);
            const listUsers = jest.spyOn(provider, 'listUsers');

            const users = await gateway.listAllUsers();

            expect(listUsers.mock.calls).toEqual([[0, 100], [1, 100], [2, 100]]);
            expect(users).toHaveLength(250);
            expect(new Set(users.map((u) => u.id)).size).toBe(250);
            expect(users[0].id).toBe('auth0|user-0');
            expect(users[99].id).toBe('auth0|user-99');
            expect(users[100].id).toBe('auth0|user-100');
            expect(users[249].id).toBe('auth0|user-249');
        });

        it('stops after the first page when the provider reports no next page', async () => {
            provider.addUsers(100);
            const listUsers = jest.spyOn(provider, 'listUsers');

            await expect(gateway.listAllUsers()).resolves.toHaveLength(100);
            expect(listUsers).toHaveBeenCalledTimes(1);
        });

        it('returns nothing for an empty tenant', async () => {
            await expect(gateway.listAllUsers()).resolves.toEqual([]);
        });

        it('stops requesting pages once the caller aborts', async () => {
            provider.addUsers(350);
            const controller = new AbortController();
            const listUsers = jest.spyOn(provider, 'listUsers').mockImplementation(async (page, perPage) => {
                controller.abort(new Error('deadline exceeded'));
                const start = page * perPage;
                return { items: provider.users.slice(start, start + perPage), total: 350, hasNext: true };
            });

            await expect(gateway.listAllUsers(controller.signal)).rejects.toThrow('deadline exceeded');
            expect(listUsers).toHaveBeenCalledTimes(1);
        });

        it('propagates a provider failure unchanged', async () => {
            const failure = new Error('Too Many Requests');
            jest.spyOn(provider, 'listUsers').mockRejectedValue(failure);

            await expect(gateway.listAllUsers()).rejects.toBe(failure);
        });
    });

    describe('getUser', () => {
        it('attaches every role from a multi-page role sweep', async () => {
            provider.users.push({ user_id: 'auth0|many', nickname: 'many' });
            const held = Array.from({ length: 150 }, (_, i) => ({ id: `rol_custom_${i}`, name: `custom-${i}` }));
            held.push({ id: 'rol_admin_test', name: 'Admin' });
            provider.roles.set('auth0|many', held);
            const listUserRoles = jest.spyOn(provider, 'listUserRoles');

            const user = await gateway.getUser('auth0|many');

            expect(listUserRoles.mock.calls).toEqual([['auth0|many', 0, 100], ['auth0|many', 1, 100]]);
            expect(user.roles).toHaveLength(151);
            expect(user.roles?.[150]).toBe(UserRole.ADMIN);
            expect(user.roles?.filter((r) => r === UserRole.UNKNOWN)).toHaveLength(150);
        });

        it('propagates a missing user as the provider reported it', async () => {
            await expect(gateway.getUser('auth0|ghost')).rejects.toThrow('The user does not exist. (auth0|ghost)');
        });
    });

    describe('updateUser', () => {
        it('sends only the fields that are set', async () => {
            await gateway.updateUser({ id: 'auth0|me', email: 'new@example.test', nickname: 'ada', location: 'Berlin' });

            expect(provider.patches).toEqual([{ userId: 'auth0|me', patch: { email: 'new@example.test', nickname: 'ada' } }]);
        });

        it('requires a user id', async () => {
            await expect(gateway.updateUser({ email: 'x@example.test' })).rejects.toBeInstanceOf(InvalidIdError);
            expect(provider.patches).toHaveLength(0);
        });
    });

    it('toProviderPatch maps every editable field to provider naming', () => {
        expect(toProviderPatch({
            email: 'e@example.test',
            name: 'Ada Lovelace',
            picture: 'https://example.test/p.png',
            givenName: 'Ada',
            familyName: 'Lovelace',
            username: 'ada',
            nickname: 'al',
        })).toEqual({
            email: 'e@example.test',
            name: 'Ada Lovelace',
            picture: 'https://example.test/p.png',
            given_name: 'Ada',
            family_name: 'Lovelace',
            username: 'ada',
            nickname: 'al',
        });
    });

    it('deleteUser passes the id through', async () => {
        await gateway.deleteUser('auth0|gone');

        expect(provider.deleted).toEqual(['auth0|gone']);
    });

    describe('roles', () => {
        it('lists roles and degrades unrecognized ones to Unknown', async () => {
            provider.roles.set('auth0|me', [
                { id: 'rol_user_test', name: 'User' },
                { id: 'rol_legacy', name: 'Legacy' },
            ]);

            await expect(gateway.listUserRoles('auth0|me')).resolves.toEqual([UserRole.USER, UserRole.UNKNOWN]);
        });

        it('assigns the mapped provider role', async () => {
            const assignRoles = jest.spyOn(provider, 'assignRoles');

            await gateway.assignUserRole('auth0|me', UserRole.ADMIN);

            expect(assignRoles).toHaveBeenCalledWith('auth0|me', ['rol_admin_test']);
            await expect(gateway.listUserRoles('auth0|me')).resolves.toEqual([UserRole.ADMIN]);
        });

        it('rejects assigning Unknown without calling the provider', async () => {
            const assignRoles = jest.spyOn(provider, 'assignRoles');

            await expect(gateway.assignUserRole('auth0|me', UserRole.UNKNOWN)).rejects.toBeInstanceOf(InvalidRoleError);
            expect(assignRoles).not.toHaveBeenCalled();
        });

        it('removes the mapped provider role', async () => {
            provider.roles.set('auth0|me', [
                { id: 'rol_user_test', name: 'User' },
                { id: 'rol_member_test', name: 'Member' },
            ]);

            await gateway.removeUserRole('auth0|me', UserRole.MEMBER);

            await expect(gateway.listUserRoles('auth0|me')).resolves.toEqual([UserRole.USER]);
        });

        it('rejects removing Unknown without calling the provider', async () => {
            const removeRoles = jest.spyOn(provider, 'removeRoles');

            await expect(gateway.removeUserRole('auth0|me', UserRole.UNKNOWN)).rejects.toBeInstanceOf(InvalidRoleError);
            expect(removeRoles).not.toHaveBeenCalled();
        });
    });
});
