// Rendered blog-stats fragments as the third-party block emits them
export const STATS_FRAGMENTS = {
  simple: `<div class="wp-block-jetpack-blog-stats"><p>1,142 hits</p></div>`,

  withYearNote: `<div class="wp-block-jetpack-blog-stats">
  <p>1,142 hits (since 2024)</p>
</div>`,

  yearFirst: `<div class="wp-block-jetpack-blog-stats"><p>2024 visitors so far: 588</p></div>`,

  europeanGrouping: `<div class="wp-block-jetpack-blog-stats"><span>1.234.567</span> views</div>`,

  spaceGrouping: `<div class="wp-block-jetpack-blog-stats"><span>12 345</span>&nbsp;views</div>`,

  withScriptAndStyle: `<div class="wp-block-jetpack-blog-stats">
  <style>.count { font-size: 12px; }</style>
  <script type="text/javascript">
    window.statsConfig = { refresh: 300 };
  </script>
  <p><strong>9,876</strong> visits</p>
</div>`,

  dataCount: `<div class="wp-block-jetpack-blog-stats" data-count="4321"><p>4.3K views</p></div>`,

  noNumber: `<div class="wp-block-jetpack-blog-stats"><p>No stats yet</p></div>`,

  tooLarge: `<div class="wp-block-jetpack-blog-stats"><p>9,999,999,999,999 hits</p></div>`,
} as const;
