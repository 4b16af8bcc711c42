const ENDPOINTS = [
  { path: "/api/ratings/import", description: "Upload a .csv or .xlsx export (multipart field \"file\")." },
  { path: "/api/ratings/filters", description: "Default filter selection for a table." },
  { path: "/api/ratings/analyze", description: "Subject averages, response rates and score distributions." },
  { path: "/api/ratings/export", description: "Subject performance overview as CSV." },
];

export default function Home() {
  return (
    <main>
      <h1>Faculty Rating Analysis</h1>
      <ul>
        {ENDPOINTS.map(e => (
          <li key={e.path}>
            <code>POST {e.path}</code> {e.description}
          </li>
        ))}
      </ul>
    </main>
  );
}
