/**
 * Listing pages used across the tests
 */

export const PAGE_URL = 'https://jobs.example.test/vacancies/qa/';

/** Three well-formed postings, one duplicated, plus navigation links */
export const LISTING_PAGE = `<!doctype html>
<html>
  <body>
    <header>
      <a href="/vacancies/">Вакансии</a>
      <a href="/vacancies/razrabotka/?action=filter&amp;direction=razrabotka">Разработка</a>
    </header>
    <main>
      <div>
        <div><h1>Engineering</h1></div>
        <div><div><span>3 vacancies</span></div></div>
        <ul>
          <li><a href="/vacancies/razrabotka/101/" class="vacancy-card">QA Engineer (Mobile)</a></li>
          <li><a href="/vacancies/razrabotka/102/"><span>QA Automation Engineer</span> <span>(Backend)</span></a></li>
          <li><a href="/vacancies/razrabotka/103/">  QA Engineer (Mobile) </a></li>
        </ul>
      </div>
    </main>
  </body>
</html>`;

/** Links moved from /vacancies/ to /vacancy/: only the heuristic scan sees them */
export const DRIFTED_PAGE = `<html><body><main>
  <a href="/vacancy/qa-engineer-mobile-201">QA Engineer (Mobile)</a>
  <a href='/vacancy/qa-lead-202'>QA Lead &amp; Mentor</a>
  <a href="/vacancy/">Vacancies</a>
</main></body></html>`;

/** Postings only in JSON-LD, with one broken block */
export const JSON_LD_PAGE = `<html><head>
<script type="application/ld+json">{"@context":"https://schema.org","@type":"JobPosting","title":"QA Engineer (Mobile)"}</script>
<script type="application/ld+json">[{"@type":"JobPosting","jobTitle":"Performance QA Engineer"},{"@type":"Organization","name":"Example"}]</script>
<script type="application/ld+json">{ not json</script>
</head><body><main><a href="/vacancy/other-1">Other posting title</a></main></body></html>`;

export const EMPTY_PAGE = '<html><body><main><p>Nothing here yet</p></main></body></html>';
