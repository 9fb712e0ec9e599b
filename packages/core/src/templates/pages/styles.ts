/** Layout styles shared by every page shell; colors come from --color-* variables */
export const BASE_STYLES = `*, *::before, *::after { box-sizing: border-box; }
body { margin: 0; font-family: system-ui, -apple-system, "Segoe UI", Roboto, sans-serif; line-height: 1.6; color: var(--color-text); background: var(--color-background); }
a { color: var(--color-primary); }
img { max-width: 100%; height: auto; }
.container { max-width: 1100px; margin: 0 auto; padding: 0 1.25rem; }
.site-nav { background: var(--color-surface); border-bottom: 1px solid var(--color-border); }
.site-nav.sticky { position: sticky; top: 0; z-index: 10; }
.nav-inner { display: flex; align-items: center; justify-content: space-between; min-height: 4rem; }
.nav-brand { font-weight: 700; font-size: 1.25rem; text-decoration: none; color: var(--color-text); display: flex; align-items: center; gap: 0.5rem; }
.nav-logo { height: 2rem; }
.nav-links, .nav-children { list-style: none; margin: 0; padding: 0; display: flex; gap: 1.25rem; }
.nav-links a { text-decoration: none; }
.nav-links li { position: relative; }
.nav-children { display: none; position: absolute; flex-direction: column; background: var(--color-surface); padding: 0.5rem 1rem; }
.nav-links li:hover > .nav-children { display: flex; }
.hero { padding: 4rem 0; background: var(--color-surface); }
.hero-image { background-size: cover; background-position: center; padding: 0; }
.hero-image .hero-overlay { background: rgba(0, 0, 0, 0.45); color: #fff; padding: 5rem 0; }
.hero-small .hero-overlay { padding: 3rem 0; }
.hero-large .hero-overlay { padding: 8rem 0; }
.hero-title { font-size: 2.5rem; margin: 0 0 1rem; }
.hero-subtitle { font-size: 1.25rem; margin: 0 0 1.5rem; }
.text-left { text-align: left; }
.text-center { text-align: center; }
.text-right { text-align: right; }
.btn { display: inline-block; padding: 0.75rem 1.5rem; border-radius: 0.375rem; text-decoration: none; font-weight: 600; border: none; cursor: pointer; }
.btn-primary { background: var(--color-primary); color: #fff; }
.btn-light { background: #fff; color: var(--color-primary); }
.page-body { display: grid; grid-template-columns: 1fr; gap: 2rem; padding-top: 2rem; padding-bottom: 2rem; }
.page-body.has-sidebar { grid-template-columns: 3fr 1fr; }
.section-heading { margin: 2rem 0 1rem; }
.section-subtitle { color: var(--color-text-muted, var(--color-text)); }
.content-block.bordered { border: 1px solid var(--color-border); padding: 1.5rem; border-radius: 0.5rem; }
.spacing-top-none { margin-top: 0; } .spacing-top-small { margin-top: 1rem; } .spacing-top-medium { margin-top: 2rem; } .spacing-top-large { margin-top: 4rem; }
.spacing-bottom-none { margin-bottom: 0; } .spacing-bottom-small { margin-bottom: 1rem; } .spacing-bottom-medium { margin-bottom: 2rem; } .spacing-bottom-large { margin-bottom: 4rem; }
.content-image { position: relative; margin: 0 0 1rem; }
.content-overlay { position: absolute; bottom: 0; left: 0; right: 0; padding: 1rem; background: rgba(0, 0, 0, 0.5); color: #fff; }
.content-timestamp { display: block; color: var(--color-text-muted, var(--color-text)); font-size: 0.875rem; }
.two-column { display: grid; gap: 2rem; grid-template-columns: 1fr 1fr; }
.two-column.ratio-60-40 { grid-template-columns: 3fr 2fr; }
.two-column.ratio-40-60 { grid-template-columns: 2fr 3fr; }
.gallery-grid { display: grid; gap: 1rem; }
.gallery-grid.cols-2 { grid-template-columns: repeat(2, 1fr); }
.gallery-grid.cols-3 { grid-template-columns: repeat(3, 1fr); }
.gallery-grid.cols-4 { grid-template-columns: repeat(4, 1fr); }
.contact-form { display: grid; gap: 1rem; max-width: 36rem; }
.contact-form label { display: grid; gap: 0.25rem; font-weight: 600; }
.contact-form input, .contact-form textarea { padding: 0.6rem; border: 1px solid var(--color-border); border-radius: 0.375rem; font: inherit; }
.cta-banner { background: var(--color-primary); color: #fff; text-align: center; padding: 3rem 0; margin: 2rem 0; }
.sidebar-widget { background: var(--color-surface); border: 1px solid var(--color-border); border-radius: 0.5rem; padding: 1.25rem; }
.about-photo { border-radius: 50%; width: 6rem; height: 6rem; object-fit: cover; }
.site-footer { border-top: 1px solid var(--color-border); background: var(--color-surface); padding: 2rem 0; margin-top: 2rem; }
.footer-inner { display: flex; flex-wrap: wrap; gap: 1rem; align-items: center; justify-content: space-between; }
.social-links { list-style: none; margin: 0; padding: 0; display: flex; gap: 1rem; }
.component-error { border: 2px dashed #dc2626; color: #991b1b; background: #fef2f2; padding: 1rem; margin: 1rem 0; font-family: monospace; }
@media (max-width: 768px) {
  .page-body.has-sidebar, .two-column { grid-template-columns: 1fr; }
  .gallery-grid.cols-3, .gallery-grid.cols-4 { grid-template-columns: repeat(2, 1fr); }
  .nav-inner { flex-direction: column; padding: 0.75rem 0; }
}
`;
