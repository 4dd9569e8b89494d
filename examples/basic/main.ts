import { createServer } from 'node:http';

import { Logger } from '@patmux/logger';
import { createRequestListener, createRouter } from '@patmux/router';

const PORT = Number(process.env.PORT ?? 3030);

const logger = new Logger('Bootstrap');
const router = createRouter();

router.get('/', (_req, res) => {
  res.send('Hello World');
});

router.get('/items/:id', (req, res) => {
  res.json({ id: req.routeVar('id'), sort: req.queryValue('sort') ?? 'asc' });
}).setName('item');

router.post('/items', (_req, res) => {
  res.setHeader('location', router.url('item', { id: '1' })).json({ created: true }, 201);
});

createServer(createRequestListener(router)).listen(PORT, () => {
  logger.info(`Server is running on http://localhost:${PORT}`);
});
