import { createNullLogger } from './logging/logger';
import { createAppState } from './app-state';
import { EditChildDialog } from './services/modal-workflow.service';
import { InMemoryGateway } from './testing/in-memory-gateway';
import { createTestApp, record, zone } from './testing/fixtures';

describe('createAppState', () => {
  it('opens the edit dialog when a record is activated', async () => {
    const { state } = createTestApp({
      parents: [zone('z1', 'example.com')],
      children: [record('r1', 'z1', { name: 'www.example.com' })],
    });
    await state.controller.loadRoot();
    await state.controller.activate();
    state.controller.moveCursor(1);

    await state.controller.activate();

    const dialog = state.dialogs.active;
    expect(dialog).toBeInstanceOf(EditChildDialog);
    expect(dialog instanceof EditChildDialog && dialog.form.name).toBe('www');
    dialog?.cancel();
  });

  it('applies label overrides to the tree', async () => {
    const state = createAppState({
      gateway: new InMemoryGateway({ parents: [zone('z1', 'example.com')] }),
      logger: createNullLogger(),
      config: { labels: { root: 'DNS', empty: 'Empty zone' } },
    });
    await state.controller.loadRoot();
    await state.controller.activate();

    expect(state.store.root.label).toBe('DNS');
    expect(state.controller.rows.map((row) => row.label)).toEqual(['example.com', 'Empty zone']);
  });

  it('reports mutation failures to the configured handler', async () => {
    const onError = vi.fn();
    const gateway = new InMemoryGateway({
      parents: [zone('z1', 'example.com')],
      children: [record('r1', 'z1')],
    });
    const state = createAppState({ gateway, logger: createNullLogger(), config: { onError } });
    await state.controller.loadRoot();
    await state.controller.activate();
    const parent = state.store.getParentNode('z1');
    const child = state.store.getChildNode('r1');
    gateway.failNext('updateChild', 'bad request');

    if (parent && child) {
      await state.dispatcher.update(parent, child, {
        type: 'A',
        name: 'example.com',
        content: '2.2.2.2',
        ttl: 1,
        proxied: true,
      });
    }

    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError).toHaveBeenCalledWith(expect.objectContaining({ scope: 'mutation', nodeId: 'r1' }));
  });

  it('closes every stream on dispose', () => {
    const { state } = createTestApp();
    const completed = vi.fn();
    state.controller.changes$.subscribe({ complete: completed });
    state.dialogs.active$.subscribe({ complete: completed });
    state.dispatcher.busy$.subscribe({ complete: completed });
    state.notifications.notifications$.subscribe({ complete: completed });

    state.dispose();

    expect(completed).toHaveBeenCalledTimes(4);
  });
});
