import http from 'node:http';

import { fromUrl, Socks4ProxyAgent } from '../src';

// Assumes a SOCKS4a proxy such as `ssh -D 1080 user@host` listening locally.
const agent = new Socks4ProxyAgent('socks4a://127.0.0.1:1080', { verbose: true });

http.get('http://example.com/', { agent }, (response) => {
    console.log(`Status: ${response.statusCode}`);
    response.resume();
});

// Raw streams work too, chaining is done by passing a dialer as upstream.
const first = fromUrl('socks4a://127.0.0.1:1080');
const second = fromUrl('socks4://nobody@10.0.0.2:1080', first);

second.dial('tcp', '10.0.0.3:22').then((socket) => {
    socket.once('data', (banner) => console.log(String(banner)));
}, (error) => {
    console.error(error);
});
