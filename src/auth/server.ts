import http from "node:http";
import dotenv from "dotenv";
import { exchangeRequestToken } from "../broker/kite_gateway.js";
import { TokenStore } from "../broker/token_store.js";
import { loadConfig } from "../config/config.js";
import { TradingError } from "../errors/trading_error.js";

dotenv.config();

const PORT = Number(process.env.AUTH_SERVER_PORT ?? "8000");

const cfg = loadConfig();
const store = new TokenStore(cfg.tokens.tokenFile);

async function handleCallback(requestToken: string): Promise<string> {
  const { apiKey, apiSecret, baseUrl } = cfg.broker;
  if (!apiKey || !apiSecret) {
    throw new TradingError("CONFIG_ERROR", "KITE_API_KEY and KITE_API_SECRET must be set in env");
  }
  const tokens = await exchangeRequestToken(baseUrl, apiKey, apiSecret, requestToken);
  await store.save(tokens);
  console.log("KITE_TOKEN_SAVED", store.path, tokens.userId, `expires=${tokens.accessExpiry}`);
  return tokens.accessExpiry;
}

const server = http.createServer((req, res) => {
  const url = new URL(req.url ?? "/", `http://localhost:${PORT}`);

  if (url.pathname !== "/kite/callback") {
    res.writeHead(200, { "Content-Type": "text/plain" });
    res.end("OK");
    return;
  }

  const requestToken = url.searchParams.get("request_token");
  if (!requestToken) {
    res.writeHead(400, { "Content-Type": "text/plain" });
    res.end("Missing request_token");
    return;
  }

  handleCallback(requestToken)
    .then((expiresAt) => {
      res.writeHead(200, { "Content-Type": "text/html" });
      res.end(`<h3>Access token saved</h3><p>Valid until ${expiresAt}.</p>`);
    })
    .catch((err: unknown) => {
      console.error("KITE_TOKEN_EXCHANGE_FAIL", TradingError.from(err).toString());
      res.writeHead(500, { "Content-Type": "text/plain" });
      res.end("Error generating access token. Check server logs.");
    });
});

server.listen(PORT, "127.0.0.1", () => {
  console.log(`Kite callback server listening on http://127.0.0.1:${PORT}/kite/callback`);
});
